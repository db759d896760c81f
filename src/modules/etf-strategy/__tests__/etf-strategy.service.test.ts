/**
 * Orchestrator Tests
 */

import { describe, it, expect } from 'vitest';
import { DataUnavailableError } from '../../../common/errors.js';
import { silentLogger } from '../../../common/logger.js';
import { DataProvider } from '../data-provider.js';
import { EtfStrategyService } from '../etf-strategy.service.js';
import type { DataMode } from '../etf.types.js';
import type { SourceRegistry } from '../sources/source.registry.js';
import { loadStrategyConfig } from '../strategy.config.js';
import { MARKET_TABLE, tableRegistry } from './helpers.js';

const config = loadStrategyConfig();
const NOW = new Date('2026-10-17T06:00:00Z');

function serviceWith(registry: SourceRegistry, defaultMode: DataMode = 'STRICT'): EtfStrategyService {
  return new EtfStrategyService({
    config,
    dataProvider: new DataProvider({ registry, logger: silentLogger, clock: () => NOW }),
    defaultMode,
    logger: silentLogger,
    clock: () => NOW,
    idFactory: () => 'run-1',
  });
}

function without(key: string): Record<string, number> {
  const table = { ...MARKET_TABLE };
  delete table[key];
  return table;
}

describe('EtfStrategyService.analyze', () => {
  it('plans a buy for the dipping index and rejects the rallying one', async () => {
    const report = await serviceWith(tableRegistry(MARKET_TABLE)).analyze();

    expect(report.runId).toBe('run-1');
    expect(report.generatedAt).toBe('2026-10-17T06:00:00.000Z');
    expect(report.mode).toBe('STRICT');
    expect(Object.keys(report.instruments)).toEqual(['S&P 500', 'Nasdaq']);

    const sp = report.instruments['S&P 500'];
    expect(sp.score.score).toBe(100);
    expect(sp.score.tier).toBe('STRONG_BUY');
    expect(sp.fund).toEqual({ code: '513500', name: 'S&P 500 ETF' });
    expect(sp.outcome).toEqual({
      kind: 'BUY_PLAN',
      plan: {
        riskTier: 'aggressive',
        ratio: 0.7,
        urgency: 'BOTTOM_FISH',
        tranches: [0.3, 0.4, 0.3],
        exit: { takeProfitPct: [15, 20], stopLossPct: -10 },
      },
    });

    const nq = report.instruments.Nasdaq;
    expect(nq.score.score).toBe(25);
    expect(nq.outcome).toEqual({
      kind: 'REJECTED',
      reasons: ['Index up 1.00%', 'Fund premium 6.0% too high', 'Futures up 0.20%'],
    });
  });

  it('always adds broad-market advice and only adds themes when headlines are given', async () => {
    const service = serviceWith(tableRegistry(MARKET_TABLE));

    const bare = await service.analyze();
    expect(bare.broadMarket.trend).toBe('DOWN');
    expect(bare.broadMarket.suggestions.map(s => s.channel)).toEqual([
      'LISTED_US_ETF',
      'LISTED_A_SHARE_ETF',
      'OFF_EXCHANGE_FUND',
    ]);
    expect(bare.themes).toBeUndefined();
    expect(bare.events).toEqual({ hasEvent: false, matches: [] });

    const withNews = await service.analyze({
      headlines: ['美联储宣布加息', '芯片龙头发布AI新品', '半导体板块走强', '5G基站建设提速'],
    });
    expect(withNews.events.matches.map(m => m.keyword)).toEqual(['美联储', '加息']);
    expect(withNews.instruments['S&P 500'].score.score).toBe(95);
    expect(withNews.themes?.map(t => (t.kind === 'THEME' ? `${t.themeId}:${t.tier}` : t.kind))).toEqual([
      'technology:HIGH',
    ]);
  });

  it('caps every plan with the caller risk profile', async () => {
    const report = await serviceWith(tableRegistry(MARKET_TABLE)).analyze({ riskProfile: 'conservative' });
    const outcome = report.instruments['S&P 500'].outcome;

    expect(outcome.kind === 'BUY_PLAN' && outcome.plan.riskTier).toBe('conservative');
    expect(outcome.kind === 'BUY_PLAN' && outcome.plan.ratio).toBe(0.3);
  });

  it('fails the whole run in STRICT mode and lists every missing signal', async () => {
    const table = without('IXIC:premium');
    delete table['SPX:futures'];

    const error = await serviceWith(tableRegistry(table)).analyze().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataUnavailableError);
    expect(error instanceof DataUnavailableError && error.failures.map(f => `${f.signalClass}:${f.symbol}`)).toEqual([
      'futures:ES=F',
      'premium:159834',
    ]);
  });

  it('substitutes in LENIENT mode and keeps going', async () => {
    const report = await serviceWith(tableRegistry(without('IXIC:premium')), 'LENIENT').analyze();
    const premium = report.instruments.Nasdaq.signals.premium;

    expect(report.mode).toBe('LENIENT');
    expect(premium).toEqual({
      signalClass: 'premium',
      symbol: '159834',
      value: 1.5,
      isEstimated: true,
      source: 'SUBSTITUTE',
    });
  });

  it('lets a request override the default mode', async () => {
    const report = await serviceWith(tableRegistry(without('SPX:index'))).analyze({ mode: 'LENIENT' });

    expect(report.mode).toBe('LENIENT');
    expect(report.instruments['S&P 500'].signals.index.source).toBe('SUBSTITUTE');
    // substitute index 0.0 → +5, premium 0.5 → +15, futures -1.5 → +15
    expect(report.instruments['S&P 500'].score.score).toBe(85);
  });

  it('uses the secondary source when the primary has no value', async () => {
    const report = await serviceWith(tableRegistry(without('SPX:index'), { 'SPX:index': -0.8 })).analyze();

    expect(report.instruments['S&P 500'].signals.index).toEqual({
      signalClass: 'index',
      symbol: '^GSPC',
      value: -0.8,
      isEstimated: false,
      source: 'STOOQ',
    });
  });
});

describe('EtfStrategyService.evaluate', () => {
  const service = serviceWith(tableRegistry(MARKET_TABLE));

  it('returns no plan below CONSIDER', () => {
    const { score, plan } = service.evaluate({
      indexChangePct: 1.0,
      premiumPct: 6.0,
      futuresChangePct: 0.2,
      hasEvent: true,
    });

    expect(score.score).toBe(10);
    expect(plan).toBeNull();
  });

  it('sizes a CONSIDER decision with the conservative tier', () => {
    // 50 + 5 (index 0) - 10 (premium 4) + 5 (futures 0) = 50
    const { score, plan } = service.evaluate({
      indexChangePct: -0.2,
      premiumPct: 4.0,
      futuresChangePct: 0,
      hasEvent: false,
    });

    expect(score.tier).toBe('CONSIDER');
    expect(plan?.riskTier).toBe('conservative');
    expect(plan?.ratio).toBe(0.1);
  });
});
