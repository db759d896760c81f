/**
 * ETF STRATEGY — Theme Ranker
 *
 * Headline keyword density per theme. A headline counts once per theme
 * (first keyword hit is enough), matching is case-insensitive, identical
 * headlines count once.
 *
 * Ranking: hitCount desc, registry order on ties, top 3, zero-hit themes
 * dropped. Nothing matched → one NO_DOMINANT_THEME entry with the
 * broad-market instruments.
 */

import type { StrategyConfig, ThemeDefinition } from './strategy.config.js';
import type { InstrumentRef, RankedTheme, RiskTierId, ThemeScore, ThemeTier } from './etf.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const MAX_RANKED_THEMES = 3;
const KEYWORDS_SHOWN = 5;

const THEME_RISK_TIER: Record<ThemeTier, RiskTierId> = {
  HIGH: 'aggressive',
  MODERATE: 'moderate',
  LOW: 'conservative',
};

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function themeTier(hitCount: number): ThemeTier {
  if (hitCount >= 3) return 'HIGH';
  if (hitCount === 2) return 'MODERATE';
  return 'LOW';
}

function matchTitles(titles: readonly string[], keywords: readonly string[]): string[] {
  const needles = keywords.map(k => k.toLowerCase()).filter(k => k.length > 0);
  const matched: string[] = [];

  for (const title of titles) {
    const haystack = title.toLowerCase();
    if (needles.some(k => haystack.includes(k)) && !matched.includes(title)) {
      matched.push(title);
    }
  }

  return matched;
}

function scoreTheme(theme: ThemeDefinition, titles: readonly string[]): RankedTheme {
  const matchedTitles = matchTitles(titles, theme.keywords);
  const tier = themeTier(matchedTitles.length);

  return {
    kind: 'THEME',
    themeId: theme.id,
    displayName: theme.displayName,
    hitCount: matchedTitles.length,
    matchedTitles,
    tier,
    suggestedRiskTier: THEME_RISK_TIER[tier],
    recommendedInstruments: theme.recommendedInstruments.map(i => ({ ...i })),
    keywords: theme.keywords.slice(0, KEYWORDS_SHOWN),
    outlook: theme.outlook,
  };
}

// ═══════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════

export function rankThemes(
  titles: readonly string[],
  themes: readonly ThemeDefinition[],
  broadMarket: readonly InstrumentRef[],
): ThemeScore[] {
  const ranked = themes
    .map(theme => scoreTheme(theme, titles))
    .filter(theme => theme.hitCount > 0)
    // Array.prototype.sort is stable: registry order survives on ties
    .sort((a, b) => b.hitCount - a.hitCount)
    .slice(0, MAX_RANKED_THEMES);

  if (ranked.length === 0) {
    return [{
      kind: 'NO_DOMINANT_THEME',
      hitCount: 0,
      recommendedInstruments: broadMarket.map(i => ({ ...i })),
    }];
  }

  return ranked;
}

export function rankConfiguredThemes(titles: readonly string[], config: StrategyConfig): ThemeScore[] {
  return rankThemes(titles, config.themes, config.broadMarket.instruments);
}
