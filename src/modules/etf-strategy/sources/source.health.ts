/**
 * ETF STRATEGY — Source Health
 * =============================
 *
 * - 3 consecutive errors → DEGRADED
 * - 5 consecutive errors → DOWN
 * - Any success → UP, reset streak
 *
 * Observational only: a DOWN source is still attempted.
 */

import type { SourceId } from '../etf.types.js';

export type SourceStatus = 'UP' | 'DEGRADED' | 'DOWN';

export interface SourceHealth {
  id: SourceId;
  status: SourceStatus;
  errorStreak: number;
  successCount: number;
  errorCount: number;
  lastOkAt?: number;
  lastErrorAt?: number;
  notes: string[];
}

// ═══════════════════════════════════════════════════════════════
// THRESHOLDS
// ═══════════════════════════════════════════════════════════════

const DEGRADED_THRESHOLD = 3;
const DOWN_THRESHOLD = 5;
const MAX_NOTES = 5;

// ═══════════════════════════════════════════════════════════════
// HEALTH MANAGEMENT
// ═══════════════════════════════════════════════════════════════

export function createInitialHealth(id: SourceId): SourceHealth {
  return {
    id,
    status: 'UP',
    errorStreak: 0,
    successCount: 0,
    errorCount: 0,
    notes: [],
  };
}

export function registerSuccess(health: SourceHealth, at: number = Date.now()): SourceHealth {
  return {
    ...health,
    status: 'UP',
    errorStreak: 0,
    successCount: health.successCount + 1,
    lastOkAt: at,
  };
}

/**
 * Latest notes are kept, oldest dropped
 */
export function registerError(health: SourceHealth, error?: string, at: number = Date.now()): SourceHealth {
  const errorStreak = health.errorStreak + 1;

  let status: SourceStatus = health.status;
  if (errorStreak >= DOWN_THRESHOLD) {
    status = 'DOWN';
  } else if (errorStreak >= DEGRADED_THRESHOLD) {
    status = 'DEGRADED';
  }

  const notes = error
    ? [...health.notes, `[${new Date(at).toISOString()}] ${error}`].slice(-MAX_NOTES)
    : health.notes;

  return {
    ...health,
    status,
    errorStreak,
    errorCount: health.errorCount + 1,
    lastErrorAt: at,
    notes,
  };
}
