/**
 * Rate Limiter
 * =============
 * Polite scheduling of quote requests, one Bottleneck per key.
 *
 * Keys are `${sourceId}:${signalClass}` so a slow source for one signal
 * class never queues requests of another class.
 */

import Bottleneck from 'bottleneck';

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
};

// Source-specific safe limits
export const RATE_LIMITS: Record<string, RateLimitConfig> = {
  YAHOO: {
    minTime: 100,
    maxConcurrent: 4,
  },
  STOOQ: {
    minTime: 200,
    maxConcurrent: 2,
  },
  EASTMONEY: {
    minTime: 100,
    maxConcurrent: 4,
  },
  FUNDGZ: {
    minTime: 100,
    maxConcurrent: 4,
  },
  SINA: {
    minTime: 200,
    maxConcurrent: 2,
  },
  DEFAULT: {
    minTime: 200,
    maxConcurrent: 2,
  },
};

export class RateLimiterPool {
  private readonly limiters = new Map<string, Bottleneck>();

  constructor(private readonly limits: Record<string, RateLimitConfig> = RATE_LIMITS) {}

  get(sourceId: string, lane: string): Bottleneck {
    const key = `${sourceId}:${lane}`;
    let limiter = this.limiters.get(key);

    if (!limiter) {
      const config = this.limits[sourceId] ?? this.limits.DEFAULT ?? RATE_LIMITS.DEFAULT;
      limiter = new Bottleneck({
        minTime: config.minTime,
        maxConcurrent: config.maxConcurrent,
      });
      this.limiters.set(key, limiter);
    }

    return limiter;
  }

  schedule<T>(sourceId: string, lane: string, fn: () => Promise<T>): Promise<T> {
    return this.get(sourceId, lane).schedule(fn);
  }

  async disconnect(): Promise<void> {
    await Promise.all([...this.limiters.values()].map(l => l.disconnect()));
    this.limiters.clear();
  }
}
