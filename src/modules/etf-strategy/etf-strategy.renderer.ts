/**
 * ETF STRATEGY — Markdown Report
 *
 * Human-readable rendering of an AnalysisReport for the CLI and
 * `?format=markdown`. Pure string building, no I/O.
 */

import { primaryEventKeyword } from './event.detector.js';
import type {
  AnalysisReport,
  BroadMarketChannel,
  InstrumentDecision,
  InstrumentRef,
  RankedTheme,
  SignalQuote,
  ThemeScore,
  ThemeTier,
  Urgency,
} from './etf.types.js';

const MATCHED_TITLES_SHOWN = 3;

const CHANNEL_LABELS: Record<BroadMarketChannel, string> = {
  LISTED_US_ETF: 'Listed US-tracking ETFs',
  LISTED_A_SHARE_ETF: 'Listed A-share ETFs',
  OFF_EXCHANGE_FUND: 'Off-exchange funds',
};

const URGENCY_LABELS: Record<Urgency, string> = {
  PROBE: 'probe',
  MODERATE: 'moderate',
  ACTIVE: 'active',
  HEAVY: 'heavy',
  BOTTOM_FISH: 'bottom fishing',
};

const THEME_LAYOUT: Record<ThemeTier, string> = {
  HIGH: 'Strong theme: build the position in 2-3 tranches',
  MODERATE: 'Developing theme: start small and add on confirmation',
  LOW: 'Weak theme: watch list only, probe at most',
};

const CLOSING_NOTES = [
  'Keep any single theme below 30% of the portfolio',
  'Take partial profit at +15% to +20%, stop out at -10%',
  'Re-check fund premiums before every purchase',
];

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

function signed(value: number, digits = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}%`;
}

function percentOf(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

function refs(instruments: readonly InstrumentRef[]): string {
  return instruments.map(i => `${i.name} (${i.code})`).join(', ');
}

function quoteLine(label: string, quote: SignalQuote): string {
  const flag = quote.isEstimated ? ' *(estimated)*' : '';
  return `- ${label}: ${signed(quote.value)} [${quote.source}]${flag}`;
}

// ═══════════════════════════════════════════════════════════════
// BLOCKS
// ═══════════════════════════════════════════════════════════════

function renderInstrument(decision: InstrumentDecision, eventKeyword: string | null): string[] {
  const { signals, score, outcome } = decision;
  const lines = [
    `## ${decision.displayName} · ${decision.fund.name} (${decision.fund.code})`,
    '',
    quoteLine('Index change', signals.index),
    quoteLine('Fund premium', signals.premium),
    quoteLine('Futures change', signals.futures),
    '',
    `**Decision:** ${score.tier} (score ${score.score}/100)`,
    '',
  ];

  if (outcome.kind === 'BUY_PLAN') {
    const { plan } = outcome;
    lines.push(
      `- Position: ${percentOf(plan.ratio)} of capital (${URGENCY_LABELS[plan.urgency]}, ${plan.riskTier} tier)`,
      `- Tranches: ${plan.tranches.map(percentOf).join(' / ')}`,
      `- Take profit: +${plan.exit.takeProfitPct[0]}% to +${plan.exit.takeProfitPct[1]}%`,
      `- Stop loss: ${plan.exit.stopLossPct}%`,
    );
  } else {
    lines.push('Not buying:');
    for (const reason of outcome.reasons) {
      lines.push(`- ${reason}`);
    }
  }

  if (eventKeyword) {
    lines.push('', `> Event in the news: ${eventKeyword}`);
  }

  lines.push('');
  return lines;
}

function renderBroadMarket(report: AnalysisReport): string[] {
  const { broadMarket } = report;
  const lines = [
    `## Broad market (${broadMarket.trend === 'DOWN' ? 'indices down' : 'indices up'})`,
    '',
  ];

  for (const suggestion of broadMarket.suggestions) {
    const instruments = suggestion.instruments.length > 0 ? `: ${refs(suggestion.instruments)}` : '';
    lines.push(`- **${CHANNEL_LABELS[suggestion.channel]}**${instruments}. ${suggestion.note}`);
  }

  lines.push('');
  return lines;
}

function renderTheme(theme: RankedTheme, rank: number): string[] {
  const lines = [
    `### ${rank}. ${theme.displayName} (${theme.tier}, ${theme.hitCount} headline${theme.hitCount === 1 ? '' : 's'})`,
    '',
  ];

  for (const title of theme.matchedTitles.slice(0, MATCHED_TITLES_SHOWN)) {
    lines.push(`- ${title}`);
  }

  lines.push(
    '',
    `- Instruments: ${refs(theme.recommendedInstruments)}`,
    `- Keywords: ${theme.keywords.join(', ')}`,
    `- Layout: ${THEME_LAYOUT[theme.tier]} (${theme.suggestedRiskTier} tier)`,
  );
  if (theme.outlook) {
    lines.push(`- Outlook: ${theme.outlook}`);
  }

  lines.push('');
  return lines;
}

function renderThemes(themes: readonly ThemeScore[]): string[] {
  const lines = ['## Themes', ''];

  const ranked = themes.filter((t): t is RankedTheme => t.kind === 'THEME');
  if (ranked.length === 0) {
    const fallback = themes.find(t => t.kind === 'NO_DOMINANT_THEME');
    lines.push(
      'No dominant theme in the headlines.',
      '',
      `- Stay with broad-market funds: ${refs(fallback?.recommendedInstruments ?? [])}`,
      '',
    );
    return lines;
  }

  ranked.forEach((theme, i) => lines.push(...renderTheme(theme, i + 1)));

  lines.push('**Strategy notes**', '');
  for (const note of CLOSING_NOTES) {
    lines.push(`- ${note}`);
  }
  lines.push('');
  return lines;
}

// ═══════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════

export function renderReportMarkdown(report: AnalysisReport): string {
  const eventKeyword = primaryEventKeyword(report.events);

  const lines = [
    `# QDII ETF dip report`,
    '',
    `Generated ${report.generatedAt} · mode ${report.mode} · run ${report.runId}`,
    '',
  ];

  for (const decision of Object.values(report.instruments)) {
    lines.push(...renderInstrument(decision, eventKeyword));
  }

  lines.push(...renderBroadMarket(report));

  if (report.themes) {
    lines.push(...renderThemes(report.themes));
  }

  return `${lines.join('\n').trimEnd()}\n`;
}
