/**
 * Shared test doubles: in-process HTTP transport, fast limiter, fake sources
 */

import { InvalidResponseShapeError } from '../../../common/errors.js';
import { loadEnv } from '../../../config/env.js';
import {
  buildNetworkConfig,
  RateLimiterPool,
  type HttpRequestOptions,
  type HttpResponse,
  type HttpTransport,
  type RateLimitConfig,
} from '../../network/index.js';
import { SourceRegistry } from '../sources/source.registry.js';
import type { QuoteSource, SignalFetchContext, SourceDeps } from '../sources/source.types.js';
import type { SignalClass, SourceId } from '../etf.types.js';
import type { InstrumentConfig } from '../strategy.config.js';

export const FAST_LIMITS: Record<string, RateLimitConfig> = {
  DEFAULT: { minTime: 0, maxConcurrent: 10 },
};

// ═══════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════

type FakeReply = HttpResponse | Error | ((url: string, options: HttpRequestOptions) => HttpResponse);

export class FakeTransport implements HttpTransport {
  readonly calls: Array<{ url: string; options: HttpRequestOptions }> = [];
  private readonly routes: Array<{ prefix: string; reply: FakeReply }> = [];

  on(prefix: string, reply: FakeReply): this {
    this.routes.push({ prefix, reply });
    return this;
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    this.calls.push({ url, options });

    const route = this.routes.find(r => url.startsWith(r.prefix));
    if (!route) {
      throw new Error(`no fake route for ${url}`);
    }
    if (route.reply instanceof Error) {
      throw route.reply;
    }
    return typeof route.reply === 'function' ? route.reply(url, options) : route.reply;
  }
}

export function ok(body: string): HttpResponse {
  return { status: 200, body };
}

export function sourceDeps(transport: HttpTransport): SourceDeps {
  return {
    transport,
    network: buildNetworkConfig(loadEnv({})),
    limiter: new RateLimiterPool(FAST_LIMITS),
  };
}

export function fetchContext(
  instrument: InstrumentConfig,
  signalClass: SignalClass,
  now: Date = new Date('2026-10-17T06:00:00Z'),
): SignalFetchContext {
  return { signalClass, instrument, now, observations: {} };
}

// ═══════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════

/**
 * Serves values keyed `${instrumentId}:${signalClass}`, fails on missing keys
 */
export function tableSource(
  id: SourceId,
  table: Record<string, number>,
  estimated = false,
): QuoteSource {
  return {
    id,
    signalClasses: ['index', 'premium', 'futures'],
    async fetch(ctx) {
      const value = table[`${ctx.instrument.id}:${ctx.signalClass}`];
      if (value === undefined) {
        throw new InvalidResponseShapeError(id, `no value for ${ctx.instrument.id}:${ctx.signalClass}`);
      }
      return { value, estimated };
    },
  };
}

export function failingSource(id: SourceId, error: Error): QuoteSource {
  return {
    id,
    signalClasses: ['index', 'premium', 'futures'],
    async fetch() {
      throw error;
    },
  };
}

/**
 * Same primary/secondary pair for every class
 */
export function tableRegistry(primary: Record<string, number>, secondary: Record<string, number> = {}): SourceRegistry {
  const chain = [tableSource('YAHOO', primary), tableSource('STOOQ', secondary)];
  return new SourceRegistry({ index: chain, futures: chain, premium: chain });
}

// SPX: deep drop, cheap fund, futures down. IXIC: rally, expensive fund.
export const MARKET_TABLE: Record<string, number> = {
  'SPX:index': -3.5,
  'SPX:premium': 0.5,
  'SPX:futures': -1.5,
  'IXIC:index': 1.0,
  'IXIC:premium': 6.0,
  'IXIC:futures': 0.2,
};
