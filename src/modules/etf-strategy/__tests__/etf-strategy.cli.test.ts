/**
 * CLI argument tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../common/errors.js';
import { parseAnalysisArgs, readHeadlinesFile } from '../etf-strategy.cli.js';

describe('parseAnalysisArgs', () => {
  it('reads flags and positional headlines', () => {
    expect(parseAnalysisArgs(['--mode', 'lenient', '--risk', 'moderate', '美联储宣布加息', 'CPI beats'])).toEqual({
      request: { mode: 'LENIENT', riskProfile: 'moderate', headlines: ['美联储宣布加息', 'CPI beats'] },
      headlinesFile: undefined,
    });
  });

  it('leaves headlines out when none are given', () => {
    expect(parseAnalysisArgs(['--headlines-file', 'news.txt'])).toEqual({
      request: {},
      headlinesFile: 'news.txt',
    });
  });

  it.each([
    [['--mode']],
    [['--mode', 'FAST']],
    [['--risk', 'reckless']],
    [['--risk', '--mode', 'STRICT']],
    [['--verbose']],
  ])('rejects %j', (argv) => {
    expect(() => parseAnalysisArgs(argv)).toThrow(ConfigError);
  });
});

describe('readHeadlinesFile', () => {
  it('returns one trimmed headline per non-empty line', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'headlines-'));
    const file = path.join(dir, 'news.txt');
    fs.writeFileSync(file, '美联储宣布加息\r\n\n  半导体板块走强  \n');

    try {
      expect(readHeadlinesFile(file)).toEqual(['美联储宣布加息', '半导体板块走强']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails with ConfigError for a missing file', () => {
    expect(() => readHeadlinesFile(path.join(os.tmpdir(), 'no-such-headlines.txt'))).toThrow(ConfigError);
  });
});
