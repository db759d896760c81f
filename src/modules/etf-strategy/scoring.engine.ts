/**
 * ETF STRATEGY — Scoring Engine
 *
 * Combines index change, fund premium, futures change and the event flag
 * into a 0..100 score. Base 50, one additive bucket per signal (first match
 * wins inside a signal), then clamp.
 *
 * Decision tiers:
 * - STRONG_BUY: >= 80
 * - BUY:        >= 65
 * - CONSIDER:   >= 50
 * - HOLD:       >= 35
 * - AVOID:      below 35
 *
 * Fixed heuristics, not fitted to anything.
 */

import type { DecisionTier, ScoreComponents, ScoreResult } from './etf.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

interface Bucket {
  max: number;      // inclusive upper bound
  delta: number;
}

export const BASE_SCORE = 50;

// Deeper index drop → higher score
const INDEX_BUCKETS: Bucket[] = [
  { max: -3.0, delta: 30 },
  { max: -2.0, delta: 20 },
  { max: -1.0, delta: 10 },
  { max: 0, delta: 5 },
];
const INDEX_UP_DELTA = -10;

// Lower premium → higher score
const PREMIUM_BUCKETS: Bucket[] = [
  { max: 1.0, delta: 15 },
  { max: 2.0, delta: 10 },
  { max: 3.0, delta: 5 },
];
const PREMIUM_HIGH_DELTA = -10;
export const PREMIUM_HIGH_THRESHOLD = 3.0;

const FUTURES_BUCKETS: Bucket[] = [
  { max: -1.0, delta: 15 },
  { max: -0.5, delta: 10 },
  { max: 0, delta: 5 },
];
const FUTURES_UP_DELTA = -5;

const EVENT_DELTA = -15;

const TIER_FLOORS: Array<{ min: number; tier: DecisionTier }> = [
  { min: 80, tier: 'STRONG_BUY' },
  { min: 65, tier: 'BUY' },
  { min: 50, tier: 'CONSIDER' },
  { min: 35, tier: 'HOLD' },
];

const TIER_RANK: Record<DecisionTier, number> = {
  AVOID: 0,
  HOLD: 1,
  CONSIDER: 2,
  BUY: 3,
  STRONG_BUY: 4,
};

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function bucketDelta(value: number, buckets: Bucket[], otherwise: number): number {
  for (const bucket of buckets) {
    if (value <= bucket.max) return bucket.delta;
  }
  return otherwise;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function tierForScore(score: number): DecisionTier {
  for (const floor of TIER_FLOORS) {
    if (score >= floor.min) return floor.tier;
  }
  return 'AVOID';
}

/**
 * CONSIDER or better gets a purchase plan
 */
export function isActionable(tier: DecisionTier): boolean {
  return TIER_RANK[tier] >= TIER_RANK.CONSIDER;
}

// ═══════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════

export function computeScore(
  indexChangePct: number,
  premiumPct: number,
  futuresChangePct: number,
  hasEvent: boolean,
): ScoreResult {
  const components: ScoreComponents = {
    index: bucketDelta(indexChangePct, INDEX_BUCKETS, INDEX_UP_DELTA),
    premium: bucketDelta(premiumPct, PREMIUM_BUCKETS, PREMIUM_HIGH_DELTA),
    futures: bucketDelta(futuresChangePct, FUTURES_BUCKETS, FUTURES_UP_DELTA),
    event: hasEvent ? EVENT_DELTA : 0,
  };

  const raw = BASE_SCORE + components.index + components.premium + components.futures + components.event;
  const score = clamp(Math.round(raw), 0, 100);

  const reasons: string[] = [];
  if (indexChangePct > 0) {
    reasons.push(`Index up ${indexChangePct.toFixed(2)}%`);
  }
  if (premiumPct > PREMIUM_HIGH_THRESHOLD) {
    reasons.push(`Fund premium ${premiumPct.toFixed(1)}% too high`);
  }
  if (futuresChangePct > 0) {
    reasons.push(`Futures up ${futuresChangePct.toFixed(2)}%`);
  }
  if (hasEvent) {
    reasons.push('Major event in the news');
  }

  return {
    score,
    tier: tierForScore(score),
    reasons,
    components,
  };
}
