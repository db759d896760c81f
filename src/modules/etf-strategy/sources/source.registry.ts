/**
 * ETF STRATEGY — Source Registry
 *
 * Ordered chain per signal class plus the health book of every source.
 * One registry per process; health is the only mutable state in it.
 */

import { ConfigError } from '../../../common/errors.js';
import type { SignalClass, SourceId } from '../etf.types.js';
import { EastmoneyPremiumSource } from './eastmoney-premium.source.js';
import { PremiumEstimator } from './premium.estimator.js';
import { SinaPremiumSource } from './sina-premium.source.js';
import {
  createInitialHealth,
  registerError,
  registerSuccess,
  type SourceHealth,
} from './source.health.js';
import type { QuoteSource, SourceDeps } from './source.types.js';
import { StooqHistorySource } from './stooq-history.source.js';
import { YahooChartSource } from './yahoo-chart.source.js';

export type SourceChains = Record<SignalClass, readonly QuoteSource[]>;

export class SourceRegistry {
  private readonly health = new Map<SourceId, SourceHealth>();

  constructor(private readonly chains: SourceChains) {
    for (const [signalClass, chain] of Object.entries(chains)) {
      if (chain.length === 0) {
        throw new ConfigError(`Empty source chain for ${signalClass}`);
      }
      for (const source of chain) {
        if (!this.health.has(source.id)) {
          this.health.set(source.id, createInitialHealth(source.id));
        }
      }
    }
  }

  chainFor(signalClass: SignalClass): readonly QuoteSource[] {
    return this.chains[signalClass];
  }

  recordSuccess(id: SourceId): void {
    this.health.set(id, registerSuccess(this.healthOf(id)));
  }

  recordError(id: SourceId, error: string): void {
    this.health.set(id, registerError(this.healthOf(id), error));
  }

  getHealth(id: SourceId): SourceHealth | undefined {
    return this.health.get(id);
  }

  listHealth(): SourceHealth[] {
    return [...this.health.values()];
  }

  private healthOf(id: SourceId): SourceHealth {
    return this.health.get(id) ?? createInitialHealth(id);
  }
}

/**
 * Production chains: Yahoo → Stooq for prices,
 * Eastmoney+fundgz → Sina → estimator for premium
 */
export function createDefaultSourceRegistry(deps: SourceDeps): SourceRegistry {
  const yahoo = new YahooChartSource(deps);
  const stooq = new StooqHistorySource(deps);

  return new SourceRegistry({
    index: [yahoo, stooq],
    futures: [yahoo, stooq],
    premium: [new EastmoneyPremiumSource(deps), new SinaPremiumSource(deps), new PremiumEstimator()],
  });
}
