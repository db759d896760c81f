/**
 * ETF STRATEGY — Premium Estimator
 *
 * Last link of the premium chain. Makes no request; always estimated.
 */

import type { SignalClass } from '../etf.types.js';
import type { QuoteSource, SignalFetchContext, SourceReading } from './source.types.js';

export const MARKET_TIME_ZONE = 'Asia/Shanghai';

const LIVE_SESSION_ADJUSTMENT = 0.2;
const CLOSED_SESSION_ADJUSTMENT = 0.5;
const PRICE_MOVE_WEIGHT = 0.1;

/**
 * US session as seen from Beijing: 22:00 through 05:59
 */
export function isUsSessionLive(now: Date, timeZone: string = MARKET_TIME_ZONE): boolean {
  const hourPart = new Intl.DateTimeFormat('en-US', { hour: 'numeric', hourCycle: 'h23', timeZone })
    .formatToParts(now)
    .find(p => p.type === 'hour');
  const hour = Number(hourPart?.value ?? Number.NaN);
  return hour >= 22 || hour <= 5;
}

export interface PremiumEstimateInput {
  basePremiumPct: number;
  now: Date;
  observedPriceChangePct?: number;
}

export function estimatePremium(input: PremiumEstimateInput): number {
  const session = isUsSessionLive(input.now) ? LIVE_SESSION_ADJUSTMENT : CLOSED_SESSION_ADJUSTMENT;
  const move = input.observedPriceChangePct !== undefined
    ? Math.abs(input.observedPriceChangePct) * PRICE_MOVE_WEIGHT
    : 0;
  return input.basePremiumPct + session + move;
}

export class PremiumEstimator implements QuoteSource {
  readonly id = 'ESTIMATOR' as const;
  readonly signalClasses: readonly SignalClass[] = ['premium'];

  async fetch(ctx: SignalFetchContext): Promise<SourceReading> {
    return {
      value: estimatePremium({
        basePremiumPct: ctx.instrument.fund.basePremiumPct,
        now: ctx.now,
        observedPriceChangePct: ctx.observations.priceChangePct,
      }),
      estimated: true,
    };
  }
}
