/**
 * ETF STRATEGY — Broad-Market Advisor
 *
 * Any tracked index down → DOWN playbook, otherwise UP.
 */

import type { StrategyConfig } from './strategy.config.js';
import type { BroadMarketAdvice, MarketTrend, SignalQuote } from './etf.types.js';

export function marketTrend(indexQuotes: readonly SignalQuote[]): MarketTrend {
  return indexQuotes.some(q => q.value < 0) ? 'DOWN' : 'UP';
}

export function adviseBroadMarket(
  indexQuotes: readonly SignalQuote[],
  config: StrategyConfig,
): BroadMarketAdvice {
  const trend = marketTrend(indexQuotes);

  return {
    trend,
    suggestions: config.broadMarket.advice[trend].map(s => ({
      channel: s.channel,
      instruments: s.instruments.map(i => ({ ...i })),
      note: s.note,
    })),
  };
}
