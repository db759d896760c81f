/**
 * Payload parser tests: fund valuation JSONP, Sina quote lines, Stooq CSV,
 * Yahoo chart JSON
 */

import { describe, it, expect } from 'vitest';
import { InvalidResponseShapeError } from '../../../common/errors.js';
import { parseFundValuation } from '../sources/fundgz.parser.js';
import { parseSinaQuotes } from '../sources/sina-quote.parser.js';
import { parseDailyCsvChange } from '../sources/stooq-history.source.js';
import { parseChartChange } from '../sources/yahoo-chart.source.js';
import { toFiniteNumber } from '../sources/base.source.js';

const VALUATION = '{"fundcode":"513500","name":"S&P 500 ETF","jzrq":"2026-10-16","dwjz":"1.5000","gsz":"1.5100","gszzl":"0.67","gztime":"2026-10-17 15:00"}';

describe('parseFundValuation', () => {
  it('reads NAV and estimate fields', () => {
    const valuation = parseFundValuation(`jsonpgz(${VALUATION});`);

    expect(valuation).toEqual({
      fundCode: '513500',
      name: 'S&P 500 ETF',
      navDate: '2026-10-16',
      nav: 1.5,
      estimatedNav: 1.51,
      estimatedChangePct: 0.67,
      valuationTime: '2026-10-17 15:00',
    });
  });

  it('tolerates surrounding whitespace', () => {
    expect(parseFundValuation(`\n jsonpgz(${VALUATION});\n`).nav).toBe(1.5);
  });

  it.each([
    ['a nested wrapper', `jsonpgz(jsonpgz(${VALUATION}));`],
    ['code before the wrapper', `alert(1);jsonpgz(${VALUATION});`],
    ['a missing terminator', `jsonpgz(${VALUATION})`],
    ['an empty payload', 'jsonpgz();'],
    ['a bare object', VALUATION],
  ])('rejects %s', (_label, body) => {
    expect(() => parseFundValuation(body)).toThrow(InvalidResponseShapeError);
  });

  it('rejects a non-numeric NAV', () => {
    const body = `jsonpgz(${VALUATION.replace('"1.5000"', '"N/A"')});`;
    expect(() => parseFundValuation(body)).toThrow(InvalidResponseShapeError);
  });

  it('rejects a zero NAV', () => {
    const body = `jsonpgz(${VALUATION.replace('"1.5000"', '"0.0000"')});`;
    expect(() => parseFundValuation(body)).toThrow(/non-positive NAV/);
  });
});

describe('parseSinaQuotes', () => {
  it('splits each line into key and fields', () => {
    const quotes = parseSinaQuotes([
      'var hq_str_sh513500="S&P 500 ETF,1.500,1.500,1.530,1.540,1.490";',
      'var hq_str_f_513500="S&P 500 ETF,1.5000,1.5000,1.4900,2026-10-16";',
    ].join('\n'));

    expect(quotes.get('sh513500')).toEqual(['S&P 500 ETF', '1.500', '1.500', '1.530', '1.540', '1.490']);
    expect(quotes.get('f_513500')?.[1]).toBe('1.5000');
  });

  it('maps an empty quote to no fields', () => {
    expect(parseSinaQuotes('var hq_str_f_513500="";').get('f_513500')).toEqual([]);
  });

  it('skips lines that are not quote assignments', () => {
    const quotes = parseSinaQuotes([
      'Forbidden',
      'var hq_str_sh513500="a,b";extra',
      'var other="x";',
      'var hq_str_sz159834="a,"b",c";',
    ].join('\r\n'));

    expect(quotes.size).toBe(0);
  });
});

describe('parseDailyCsvChange', () => {
  const header = 'Date,Open,High,Low,Close,Volume';

  it('compares the last two closes', () => {
    const csv = [header, '2026-10-15,5000,5010,4990,5000,100', '2026-10-16,5000,5010,4890,4900,100'].join('\n');
    expect(parseDailyCsvChange(csv)).toBeCloseTo(-2, 10);
  });

  it('sorts rows by date first', () => {
    const csv = [header, '2026-10-16,5000,5010,4890,5100,100', '2026-10-15,5000,5010,4990,5000,100'].join('\n');
    expect(parseDailyCsvChange(csv)).toBeCloseTo(2, 10);
  });

  it('rejects plain-text answers', () => {
    expect(() => parseDailyCsvChange('No data')).toThrow(InvalidResponseShapeError);
  });

  it('needs two rows', () => {
    expect(() => parseDailyCsvChange(`${header}\n2026-10-16,1,1,1,1,1`)).toThrow(/need two closes/);
  });

  it('rejects "N/D" closes', () => {
    const csv = [header, '2026-10-15,N/D,N/D,N/D,N/D,N/D', '2026-10-16,1,1,1,1,1'].join('\n');
    expect(() => parseDailyCsvChange(csv)).toThrow(InvalidResponseShapeError);
  });
});

describe('parseChartChange', () => {
  const chart = (meta: Record<string, number>) => JSON.stringify({ chart: { result: [{ meta }] } });

  it('uses previousClose, then chartPreviousClose', () => {
    expect(parseChartChange(chart({ regularMarketPrice: 98, previousClose: 100 }))).toBeCloseTo(-2, 10);
    expect(parseChartChange(chart({ regularMarketPrice: 101, chartPreviousClose: 100 }))).toBeCloseTo(1, 10);
  });

  it('rejects missing or non-positive prices', () => {
    expect(() => parseChartChange(chart({ regularMarketPrice: 98 }))).toThrow(InvalidResponseShapeError);
    expect(() => parseChartChange(chart({ regularMarketPrice: 98, previousClose: 0 }))).toThrow(InvalidResponseShapeError);
    expect(() => parseChartChange('{"chart":{"result":[]}}')).toThrow(InvalidResponseShapeError);
    expect(() => parseChartChange('<html>')).toThrow(/not valid JSON/);
  });
});

describe('toFiniteNumber', () => {
  it('accepts plain decimals only', () => {
    expect(toFiniteNumber(' 1.25 ')).toBe(1.25);
    expect(toFiniteNumber('-0.5')).toBe(-0.5);
    expect(toFiniteNumber(3)).toBe(3);
    expect(toFiniteNumber('N/D')).toBeNull();
    expect(toFiniteNumber('-')).toBeNull();
    expect(toFiniteNumber('')).toBeNull();
    expect(toFiniteNumber('0x10')).toBeNull();
    expect(toFiniteNumber('1e3')).toBeNull();
    expect(toFiniteNumber(Number.NaN)).toBeNull();
  });
});
