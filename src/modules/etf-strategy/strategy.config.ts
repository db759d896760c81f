/**
 * ETF STRATEGY — Static Configuration
 *
 * Risk tiers, tracked instruments, event keywords, theme registry and
 * broad-market suggestions. Loaded once from data/strategy.config.json,
 * validated, frozen, then passed explicitly to every component.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../common/errors.js';
import type { RiskTier, RiskTierId } from './etf.types.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const nonEmpty = z.string().trim().min(1);

const InstrumentRefSchema = z.object({
  code: nonEmpty,
  name: nonEmpty,
});

// Sizing and theme tiers look these up by id: all three are required
const RISK_TIER_IDS = ['conservative', 'moderate', 'aggressive'] as const;

const RiskTierSchema = z.object({
  id: z.enum(RISK_TIER_IDS),
  name: nonEmpty,
  maxPosition: z.number().gt(0).lte(1),
});

const QuoteSymbolsSchema = z.object({
  yahoo: nonEmpty,
  stooq: nonEmpty,
});

const InstrumentSchema = z.object({
  id: nonEmpty,
  displayName: nonEmpty,
  index: QuoteSymbolsSchema,
  futures: QuoteSymbolsSchema,
  fund: z.object({
    code: z.string().regex(/^\d{6}$/, 'fund code must be six digits'),
    exchange: z.enum(['SH', 'SZ']),
    name: nonEmpty,
    basePremiumPct: z.number().finite().default(1.0),
  }),
});

const ThemeSchema = z.object({
  id: nonEmpty,
  displayName: nonEmpty,
  keywords: z.array(nonEmpty).min(1),
  recommendedInstruments: z.array(InstrumentRefSchema).min(1),
  outlook: z.string().default(''),
});

const BroadMarketSuggestionSchema = z.object({
  channel: z.enum(['LISTED_US_ETF', 'LISTED_A_SHARE_ETF', 'OFF_EXCHANGE_FUND']),
  instruments: z.array(InstrumentRefSchema),
  note: nonEmpty,
});

const StrategyConfigSchema = z
  .object({
    version: z.number().int().positive(),
    riskTiers: z.array(RiskTierSchema).min(1),
    instruments: z.array(InstrumentSchema).min(1),
    eventKeywords: z.array(nonEmpty).min(1),
    themes: z.array(ThemeSchema).min(1),
    broadMarket: z.object({
      instruments: z.array(InstrumentRefSchema).min(1),
      advice: z.object({
        DOWN: z.array(BroadMarketSuggestionSchema),
        UP: z.array(BroadMarketSuggestionSchema),
      }),
    }),
  })
  .superRefine((cfg, ctx) => {
    const themeIds = new Set<string>();
    cfg.themes.forEach((theme, i) => {
      if (themeIds.has(theme.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['themes', i, 'id'], message: `duplicate theme id "${theme.id}"` });
      }
      themeIds.add(theme.id);
    });

    const instrumentIds = new Set<string>();
    cfg.instruments.forEach((instrument, i) => {
      if (instrumentIds.has(instrument.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['instruments', i, 'id'], message: `duplicate instrument id "${instrument.id}"` });
      }
      instrumentIds.add(instrument.id);
    });

    const tierIds = new Set(cfg.riskTiers.map(t => t.id));
    if (tierIds.size !== cfg.riskTiers.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['riskTiers'], message: 'duplicate risk tier id' });
    }
    for (const id of RISK_TIER_IDS) {
      if (!tierIds.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['riskTiers'], message: `missing risk tier "${id}"` });
      }
    }
  });

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type InstrumentConfig = z.infer<typeof InstrumentSchema>;
export type ThemeDefinition = z.infer<typeof ThemeSchema>;
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;

export const DEFAULT_STRATEGY_CONFIG_PATH = fileURLToPath(
  new URL('../../../data/strategy.config.json', import.meta.url),
);

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate an already-parsed configuration object
 */
export function parseStrategyConfig(raw: unknown): StrategyConfig {
  const parsed = StrategyConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Malformed strategy config: ${issues}`);
  }
  return deepFreeze(parsed.data);
}

export function loadStrategyConfig(path: string = DEFAULT_STRATEGY_CONFIG_PATH): StrategyConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read strategy config at ${path}: ${errorMessage(err)}`);
  }
  return parseStrategyConfig(raw);
}

// ═══════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════

export function resolveRiskTier(config: StrategyConfig, id: string): RiskTier {
  const tier = config.riskTiers.find(t => t.id === id);
  if (!tier) {
    throw new ConfigError(`Unknown risk tier "${id}" (known: ${config.riskTiers.map(t => t.id).join(', ')})`);
  }
  return tier;
}

export function isRiskTierId(value: string): value is RiskTierId {
  return value === 'conservative' || value === 'moderate' || value === 'aggressive';
}
