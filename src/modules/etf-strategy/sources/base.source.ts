/**
 * ETF STRATEGY — Base Quote Source
 *
 * Common plumbing for HTTP-backed sources:
 * - per-source timeout
 * - rate-limited scheduling per (source, signal class)
 * - status check
 * - validated numeric conversion
 */

import { InvalidResponseShapeError } from '../../../common/errors.js';
import { HttpStatusError, resolveTimeout, type HttpRequestOptions } from '../../network/index.js';
import type { SignalClass, SourceId } from '../etf.types.js';
import type { QuoteSource, SignalFetchContext, SourceDeps, SourceReading } from './source.types.js';

// ═══════════════════════════════════════════════════════════════
// NUMERIC HELPERS
// ═══════════════════════════════════════════════════════════════

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Strict number conversion: finite decimals only, no "N/D", "-", "" or hex
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toPositiveNumber(value: unknown): number | null {
  const n = toFiniteNumber(value);
  return n !== null && n > 0 ? n : null;
}

/**
 * (current - previous) / previous * 100, both prices must be positive
 */
export function percentChange(source: string, current: unknown, previous: unknown): number {
  const cur = toPositiveNumber(current);
  const prev = toPositiveNumber(previous);

  if (cur === null || prev === null) {
    throw new InvalidResponseShapeError(
      source,
      `expected positive prices, got current=${String(current)} previous=${String(previous)}`,
    );
  }

  return ((cur - prev) / prev) * 100;
}

export function parseJsonBody(source: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new InvalidResponseShapeError(source, 'response is not valid JSON');
  }
}

// ═══════════════════════════════════════════════════════════════
// BASE SOURCE
// ═══════════════════════════════════════════════════════════════

export abstract class BaseQuoteSource implements QuoteSource {
  abstract readonly id: SourceId;
  abstract readonly signalClasses: readonly SignalClass[];

  constructor(protected readonly deps: SourceDeps) {}

  abstract fetch(ctx: SignalFetchContext): Promise<SourceReading>;

  /**
   * GET through the limiter lane of this source + signal class.
   * Non-2xx answers are failures.
   */
  protected async request(
    ctx: SignalFetchContext,
    url: string,
    options: HttpRequestOptions = {},
    timeoutKey: string = this.id,
  ): Promise<string> {
    const timeoutMs = options.timeoutMs ?? resolveTimeout(this.deps.network, timeoutKey);

    const response = await this.deps.limiter.schedule(timeoutKey, ctx.signalClass, () =>
      this.deps.transport.get(url, { ...options, timeoutMs }),
    );

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(url, response.status);
    }
    if (!response.body.trim()) {
      throw new InvalidResponseShapeError(this.id, 'empty response body');
    }

    return response.body;
  }
}
