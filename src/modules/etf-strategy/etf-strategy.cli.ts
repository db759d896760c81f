/**
 * ETF STRATEGY — CLI argument handling
 *
 *   run-analysis [--mode STRICT|LENIENT] [--risk <tier>] [--headlines-file <path>] [headline ...]
 *
 * Headlines file: one headline per line, blank lines ignored.
 */

import fs from 'fs';
import { ConfigError, errorMessage } from '../../common/errors.js';
import { isRiskTierId } from './strategy.config.js';
import type { AnalyzeRequest, DataMode } from './etf.types.js';

export interface AnalysisCliArgs {
  request: AnalyzeRequest;
  headlinesFile?: string;
}

function isDataMode(value: string): value is DataMode {
  return value === 'STRICT' || value === 'LENIENT';
}

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value;
}

export function parseAnalysisArgs(argv: readonly string[]): AnalysisCliArgs {
  const request: AnalyzeRequest = {};
  const headlines: string[] = [];
  let headlinesFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--mode') {
      const value = takeValue(argv, i++, arg).toUpperCase();
      if (!isDataMode(value)) throw new ConfigError(`Unknown mode "${value}"`);
      request.mode = value;
    } else if (arg === '--risk') {
      const value = takeValue(argv, i++, arg);
      if (!isRiskTierId(value)) throw new ConfigError(`Unknown risk tier "${value}"`);
      request.riskProfile = value;
    } else if (arg === '--headlines-file') {
      headlinesFile = takeValue(argv, i++, arg);
    } else if (arg.startsWith('--')) {
      throw new ConfigError(`Unknown option ${arg}`);
    } else {
      headlines.push(arg);
    }
  }

  if (headlines.length > 0) {
    request.headlines = headlines;
  }
  return { request, headlinesFile };
}

export function readHeadlinesFile(path: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read headlines file ${path}: ${errorMessage(err)}`);
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
