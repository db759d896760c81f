/**
 * ETF STRATEGY — Types
 *
 * Result records for one analysis run. Everything here is created fresh
 * per invocation and dropped once the report is produced.
 */

// ═══════════════════════════════════════════════════════════════
// SIGNALS
// ═══════════════════════════════════════════════════════════════

export type SignalClass = 'index' | 'premium' | 'futures';

export const SIGNAL_CLASSES: readonly SignalClass[] = ['index', 'premium', 'futures'];

export type DataMode = 'STRICT' | 'LENIENT';

export type SourceId = 'YAHOO' | 'STOOQ' | 'EASTMONEY' | 'SINA' | 'ESTIMATOR';

export type QuoteOrigin = SourceId | 'SUBSTITUTE';

/**
 * One acquired signal. `value` is a change percent for index/futures and a
 * premium percent for premium.
 */
export interface SignalQuote {
  signalClass: SignalClass;
  symbol: string;
  value: number;
  isEstimated: boolean;
  source: QuoteOrigin;
}

export interface InstrumentSignals {
  index: SignalQuote;
  premium: SignalQuote;
  futures: SignalQuote;
}

// ═══════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════

export interface EventMatch {
  keyword: string;
  title: string;
}

export interface EventFlag {
  hasEvent: boolean;
  matches: EventMatch[];
}

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

export type DecisionTier = 'STRONG_BUY' | 'BUY' | 'CONSIDER' | 'HOLD' | 'AVOID';

export interface ScoreComponents {
  index: number;
  premium: number;
  futures: number;
  event: number;
}

export interface ScoreResult {
  score: number;              // integer, 0..100
  tier: DecisionTier;
  reasons: string[];          // adverse buckets that fired
  components: ScoreComponents;
}

// ═══════════════════════════════════════════════════════════════
// SIZING
// ═══════════════════════════════════════════════════════════════

export type RiskTierId = 'conservative' | 'moderate' | 'aggressive';

export interface RiskTier {
  id: RiskTierId;
  name: string;
  maxPosition: number;        // 0..1
}

export type Urgency = 'PROBE' | 'MODERATE' | 'ACTIVE' | 'HEAVY' | 'BOTTOM_FISH';

export interface ExitPolicy {
  takeProfitPct: readonly [number, number];
  stopLossPct: number;
}

export interface PositionPlan {
  riskTier: RiskTierId;
  ratio: number;              // (0, riskTier.maxPosition]
  urgency: Urgency;
  tranches: number[];         // fractions of the position, sum to 1
  exit: ExitPolicy;
}

// ═══════════════════════════════════════════════════════════════
// THEMES
// ═══════════════════════════════════════════════════════════════

export type ThemeTier = 'HIGH' | 'MODERATE' | 'LOW';

export interface InstrumentRef {
  code: string;
  name: string;
}

export interface RankedTheme {
  kind: 'THEME';
  themeId: string;
  displayName: string;
  hitCount: number;
  matchedTitles: string[];
  tier: ThemeTier;
  suggestedRiskTier: RiskTierId;
  recommendedInstruments: InstrumentRef[];
  keywords: string[];
  outlook: string;
}

export interface NoDominantTheme {
  kind: 'NO_DOMINANT_THEME';
  hitCount: 0;
  recommendedInstruments: InstrumentRef[];
}

export type ThemeScore = RankedTheme | NoDominantTheme;

// ═══════════════════════════════════════════════════════════════
// BROAD MARKET
// ═══════════════════════════════════════════════════════════════

export type MarketTrend = 'DOWN' | 'UP';

export type BroadMarketChannel = 'LISTED_US_ETF' | 'LISTED_A_SHARE_ETF' | 'OFF_EXCHANGE_FUND';

export interface BroadMarketSuggestion {
  channel: BroadMarketChannel;
  instruments: InstrumentRef[];
  note: string;
}

export interface BroadMarketAdvice {
  trend: MarketTrend;
  suggestions: BroadMarketSuggestion[];
}

// ═══════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════

export type InstrumentOutcome =
  | { kind: 'BUY_PLAN'; plan: PositionPlan }
  | { kind: 'REJECTED'; reasons: string[] };

export interface InstrumentDecision {
  instrumentId: string;
  displayName: string;
  fund: InstrumentRef;
  signals: InstrumentSignals;
  score: ScoreResult;
  outcome: InstrumentOutcome;
}

export interface AnalysisReport {
  runId: string;
  generatedAt: string;
  mode: DataMode;
  events: EventFlag;
  instruments: Record<string, InstrumentDecision>;
  broadMarket: BroadMarketAdvice;
  themes?: ThemeScore[];
}

export interface AnalyzeRequest {
  headlines?: string[];
  mode?: DataMode;
  riskProfile?: RiskTierId;
}
