/**
 * ETF STRATEGY — Quote Source Contracts
 *
 * A source is one backing feed for one or more signal classes. Sources are
 * sensors: they return a number or throw, the chain decides what happens next.
 */

import type { HttpTransport, NetworkConfig, RateLimiterPool } from '../../network/index.js';
import type { InstrumentConfig } from '../strategy.config.js';
import type { SignalClass, SourceId } from '../etf.types.js';

/**
 * Facts an earlier source saw even though it could not finish,
 * e.g. the fund's own price move without a NAV.
 */
export interface ChainObservations {
  priceChangePct?: number;
}

export interface SignalFetchContext {
  signalClass: SignalClass;
  instrument: InstrumentConfig;
  now: Date;
  observations: ChainObservations;
}

export interface SourceReading {
  value: number;
  estimated: boolean;
}

export interface QuoteSource {
  readonly id: SourceId;
  readonly signalClasses: readonly SignalClass[];
  fetch: (ctx: SignalFetchContext) => Promise<SourceReading>;
}

export interface SourceDeps {
  transport: HttpTransport;
  network: NetworkConfig;
  limiter: RateLimiterPool;
}
