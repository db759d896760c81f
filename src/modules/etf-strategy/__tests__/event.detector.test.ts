/**
 * Event Detector Tests
 */

import { describe, it, expect } from 'vitest';
import { primaryEventKeyword, scanEvents } from '../event.detector.js';

describe('scanEvents', () => {
  it('records one match per keyword found in a headline', () => {
    const flag = scanEvents(['美联储宣布加息'], ['美联储', '加息']);

    expect(flag.hasEvent).toBe(true);
    expect(flag.matches).toEqual([
      { keyword: '美联储', title: '美联储宣布加息' },
      { keyword: '加息', title: '美联储宣布加息' },
    ]);
  });

  it('orders matches by title, then keyword', () => {
    const flag = scanEvents(['CPI beats', 'GDP and CPI'], ['GDP', 'CPI']);

    expect(flag.matches).toEqual([
      { keyword: 'CPI', title: 'CPI beats' },
      { keyword: 'GDP', title: 'GDP and CPI' },
      { keyword: 'CPI', title: 'GDP and CPI' },
    ]);
  });

  it('is case-sensitive', () => {
    expect(scanEvents(['cpi print'], ['CPI']).hasEvent).toBe(false);
  });

  it('reports no event for empty input', () => {
    expect(scanEvents([], ['CPI'])).toEqual({ hasEvent: false, matches: [] });
  });

  it('does not deduplicate identical headlines', () => {
    expect(scanEvents(['战争', '战争'], ['战争']).matches).toHaveLength(2);
  });

  it('matches a repeated keyword once per headline', () => {
    const flag = scanEvents(['CPI beats', 'CPI misses'], ['CPI', 'CPI']);

    expect(flag.matches).toEqual([
      { keyword: 'CPI', title: 'CPI beats' },
      { keyword: 'CPI', title: 'CPI misses' },
    ]);
  });
});

describe('primaryEventKeyword', () => {
  it('returns the first matched keyword or null', () => {
    expect(primaryEventKeyword(scanEvents(['降息预期'], ['加息', '降息']))).toBe('降息');
    expect(primaryEventKeyword({ hasEvent: false, matches: [] })).toBeNull();
  });
});
