/**
 * ETF STRATEGY — Orchestrator
 *
 * One analysis run:
 *   1. fetch every signal of every instrument concurrently + scan events
 *   2. STRICT: any exhausted chain → one DataUnavailableError, no results
 *   3. score → plan (CONSIDER or better) or rejection
 *   4. broad-market block always, theme block when headlines were given
 */

import { v4 as uuidv4 } from 'uuid';
import { DataUnavailableError, type FailedSignal } from '../../common/errors.js';
import { createConsoleLogger, type Logger } from '../../common/logger.js';
import { adviseBroadMarket } from './broad-market.advisor.js';
import type { DataProvider } from './data-provider.js';
import { scanEvents } from './event.detector.js';
import { selectRiskTier, sizePosition } from './position.sizer.js';
import { computeScore, isActionable } from './scoring.engine.js';
import { resolveRiskTier, type InstrumentConfig, type StrategyConfig } from './strategy.config.js';
import { rankConfiguredThemes } from './theme.ranker.js';
import {
  SIGNAL_CLASSES,
  type AnalysisReport,
  type AnalyzeRequest,
  type DataMode,
  type EventFlag,
  type InstrumentDecision,
  type InstrumentOutcome,
  type InstrumentSignals,
  type PositionPlan,
  type RiskTierId,
  type ScoreResult,
  type SignalClass,
  type SignalQuote,
  type ThemeScore,
} from './etf.types.js';

export interface EtfStrategyServiceOptions {
  config: StrategyConfig;
  dataProvider: DataProvider;
  defaultMode?: DataMode;
  logger?: Logger;
  clock?: () => Date;
  idFactory?: () => string;
}

export interface SignalEvaluationInput {
  indexChangePct: number;
  premiumPct: number;
  futuresChangePct: number;
  hasEvent: boolean;
  riskProfile?: RiskTierId;
}

export interface SignalEvaluation {
  score: ScoreResult;
  plan: PositionPlan | null;
}

export class EtfStrategyService {
  private readonly config: StrategyConfig;
  private readonly dataProvider: DataProvider;
  private readonly defaultMode: DataMode;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(options: EtfStrategyServiceOptions) {
    this.config = options.config;
    this.dataProvider = options.dataProvider;
    this.defaultMode = options.defaultMode ?? 'STRICT';
    this.logger = options.logger ?? createConsoleLogger('EtfStrategy');
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => uuidv4());
  }

  get mode(): DataMode {
    return this.defaultMode;
  }

  // ═══════════════════════════════════════════════════════════════
  // FULL RUN
  // ═══════════════════════════════════════════════════════════════

  async analyze(request: AnalyzeRequest = {}): Promise<AnalysisReport> {
    const runId = this.idFactory();
    const mode = request.mode ?? this.defaultMode;
    const headlines = request.headlines ?? [];

    // Unknown profile must fail before any request goes out
    if (request.riskProfile !== undefined) {
      resolveRiskTier(this.config, request.riskProfile);
    }

    this.logger.info(
      { runId, mode, instruments: this.config.instruments.length, headlines: headlines.length },
      'Analysis started',
    );

    const events = scanEvents(headlines, this.config.eventKeywords);
    const signals = await this.fetchAllSignals(runId, mode);

    const instruments: Record<string, InstrumentDecision> = {};
    for (const instrument of this.config.instruments) {
      const decision = this.decide(instrument, signals[instrument.id], events, request.riskProfile);
      instruments[instrument.displayName] = decision;
    }

    const indexQuotes = this.config.instruments.map(i => signals[i.id].index);
    const report: AnalysisReport = {
      runId,
      generatedAt: this.clock().toISOString(),
      mode,
      events,
      instruments,
      broadMarket: adviseBroadMarket(indexQuotes, this.config),
    };
    if (headlines.length > 0) {
      report.themes = rankConfiguredThemes(headlines, this.config);
    }

    this.logger.info(
      {
        runId,
        decisions: Object.values(instruments).map(d => `${d.instrumentId}:${d.score.tier}`),
        hasEvent: events.hasEvent,
      },
      'Analysis complete',
    );

    return report;
  }

  private async fetchAllSignals(runId: string, mode: DataMode): Promise<Record<string, InstrumentSignals>> {
    const tasks = this.config.instruments.flatMap(instrument =>
      SIGNAL_CLASSES.map(signalClass => ({ instrument, signalClass })),
    );

    const settled = await Promise.allSettled(
      tasks.map(t => this.dataProvider.fetchSignal(t.signalClass, t.instrument, mode)),
    );

    const failures: FailedSignal[] = [];
    const quotes = new Map<string, Partial<Record<SignalClass, SignalQuote>>>();

    settled.forEach((result, i) => {
      const { instrument, signalClass } = tasks[i];
      if (result.status === 'rejected') {
        if (result.reason instanceof DataUnavailableError) {
          failures.push(...result.reason.failures);
          return;
        }
        throw result.reason;
      }
      const entry = quotes.get(instrument.id) ?? {};
      entry[signalClass] = result.value;
      quotes.set(instrument.id, entry);
    });

    if (failures.length > 0) {
      this.logger.error({ runId, failures }, 'Analysis aborted: market data unavailable');
      throw new DataUnavailableError(failures);
    }

    const signals: Record<string, InstrumentSignals> = {};
    for (const instrument of this.config.instruments) {
      const entry = quotes.get(instrument.id) ?? {};
      const { index, premium, futures } = entry;
      if (!index || !premium || !futures) {
        throw new DataUnavailableError([{
          signalClass: SIGNAL_CLASSES.filter(c => !entry[c]).join(','),
          symbol: instrument.id,
          attempts: [],
        }]);
      }
      signals[instrument.id] = { index, premium, futures };
    }
    return signals;
  }

  // ═══════════════════════════════════════════════════════════════
  // PURE STEPS
  // ═══════════════════════════════════════════════════════════════

  decide(
    instrument: InstrumentConfig,
    signals: InstrumentSignals,
    events: EventFlag,
    riskProfile?: RiskTierId,
  ): InstrumentDecision {
    const { score, plan } = this.evaluate({
      indexChangePct: signals.index.value,
      premiumPct: signals.premium.value,
      futuresChangePct: signals.futures.value,
      hasEvent: events.hasEvent,
      riskProfile,
    });

    const outcome: InstrumentOutcome = plan
      ? { kind: 'BUY_PLAN', plan }
      : { kind: 'REJECTED', reasons: score.reasons.length > 0 ? score.reasons : [`Score ${score.score} below CONSIDER`] };

    return {
      instrumentId: instrument.id,
      displayName: instrument.displayName,
      fund: { code: instrument.fund.code, name: instrument.fund.name },
      signals,
      score,
      outcome,
    };
  }

  /**
   * Score a set of raw signal values and size a plan when actionable
   */
  evaluate(input: SignalEvaluationInput): SignalEvaluation {
    const score = computeScore(input.indexChangePct, input.premiumPct, input.futuresChangePct, input.hasEvent);
    if (!isActionable(score.tier)) {
      return { score, plan: null };
    }

    const riskTier = selectRiskTier(this.config, score.tier, input.riskProfile);
    return { score, plan: sizePosition(input.indexChangePct, riskTier) };
  }

  detectEvents(headlines: readonly string[]): EventFlag {
    return scanEvents(headlines, this.config.eventKeywords);
  }

  rankThemes(headlines: readonly string[]): ThemeScore[] {
    return rankConfiguredThemes(headlines, this.config);
  }
}
