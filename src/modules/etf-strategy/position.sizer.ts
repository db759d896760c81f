/**
 * ETF STRATEGY — Position Sizer
 *
 * Drop magnitude → base position ratio, capped by the risk tier's
 * maxPosition. Tranche split and exit policy come with every plan.
 */

import { resolveRiskTier, type StrategyConfig } from './strategy.config.js';
import type {
  DecisionTier,
  ExitPolicy,
  PositionPlan,
  RiskTier,
  RiskTierId,
  Urgency,
} from './etf.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

// Evaluated top-down: index change >= minChange
const RATIO_BUCKETS: Array<{ minChange: number; ratio: number; urgency: Urgency }> = [
  { minChange: -0.5, ratio: 0.1, urgency: 'PROBE' },
  { minChange: -1.0, ratio: 0.2, urgency: 'MODERATE' },
  { minChange: -2.0, ratio: 0.3, urgency: 'ACTIVE' },
  { minChange: -3.0, ratio: 0.5, urgency: 'HEAVY' },
];
const CRASH_RATIO = 0.7;

// Evaluated top-down: |index change| >= minDrop
const TRANCHE_PLANS: Array<{ minDrop: number; tranches: number[] }> = [
  { minDrop: 2.0, tranches: [0.3, 0.4, 0.3] },
  { minDrop: 1.0, tranches: [0.5, 0.5] },
];

export const EXIT_POLICY: ExitPolicy = Object.freeze({
  takeProfitPct: Object.freeze([15, 20] as const),
  stopLossPct: -10,
});

// Decision tier → risk tier the plan is sized with
const DECISION_RISK_TIER: Record<DecisionTier, RiskTierId> = {
  STRONG_BUY: 'aggressive',
  BUY: 'moderate',
  CONSIDER: 'conservative',
  HOLD: 'conservative',
  AVOID: 'conservative',
};

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function baseRatio(indexChangePct: number): { ratio: number; urgency: Urgency } {
  for (const bucket of RATIO_BUCKETS) {
    if (indexChangePct >= bucket.minChange) {
      return { ratio: bucket.ratio, urgency: bucket.urgency };
    }
  }
  return { ratio: CRASH_RATIO, urgency: 'BOTTOM_FISH' };
}

export function trancheSplit(indexChangePct: number): number[] {
  const drop = Math.abs(indexChangePct);
  for (const plan of TRANCHE_PLANS) {
    if (drop >= plan.minDrop) return [...plan.tranches];
  }
  return [1];
}

// ═══════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════

export function sizePosition(indexChangePct: number, riskTier: RiskTier): PositionPlan {
  const { ratio, urgency } = baseRatio(indexChangePct);

  return {
    riskTier: riskTier.id,
    ratio: Math.min(ratio, riskTier.maxPosition),
    urgency,
    tranches: trancheSplit(indexChangePct),
    exit: { takeProfitPct: EXIT_POLICY.takeProfitPct, stopLossPct: EXIT_POLICY.stopLossPct },
  };
}

/**
 * Risk tier for a decision. A caller risk profile can only make it more
 * conservative (lower maxPosition), never more aggressive.
 */
export function selectRiskTier(
  config: StrategyConfig,
  tier: DecisionTier,
  riskProfile?: string,
): RiskTier {
  const derived = resolveRiskTier(config, DECISION_RISK_TIER[tier]);
  if (riskProfile === undefined) return derived;

  const profile = resolveRiskTier(config, riskProfile);
  return profile.maxPosition < derived.maxPosition ? profile : derived;
}
