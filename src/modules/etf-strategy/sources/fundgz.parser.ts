/**
 * ETF STRATEGY — Fund Valuation (JSONP) Parser
 *
 * fundgz answers `jsonpgz({...});`. The wrapper is stripped by exact
 * delimiters and the payload parsed as data; nothing is evaluated.
 */

import { z } from 'zod';
import { InvalidResponseShapeError } from '../../../common/errors.js';
import { parseJsonBody, toFiniteNumber } from './base.source.js';

const JSONP_PREFIX = 'jsonpgz(';
const JSONP_SUFFIX = ');';

const numericString = z.string().refine(v => toFiniteNumber(v) !== null, 'expected a numeric string');

const FundValuationSchema = z.object({
  fundcode: z.string(),
  name: z.string().optional(),
  jzrq: z.string(),                 // NAV date
  dwjz: numericString,              // unit NAV
  gsz: numericString.optional(),    // intraday estimate
  gszzl: numericString.optional(),  // estimated change %
  gztime: z.string().optional(),
});

export interface FundValuation {
  fundCode: string;
  name?: string;
  navDate: string;
  nav: number;
  estimatedNav?: number;
  estimatedChangePct?: number;
  valuationTime?: string;
}

export function parseFundValuation(body: string): FundValuation {
  const text = body.trim();
  if (!text.startsWith(JSONP_PREFIX) || !text.endsWith(JSONP_SUFFIX)) {
    throw new InvalidResponseShapeError('FUNDGZ', 'missing jsonpgz(...) wrapper');
  }

  const payload = text.slice(JSONP_PREFIX.length, text.length - JSONP_SUFFIX.length);
  const parsed = FundValuationSchema.safeParse(parseJsonBody('FUNDGZ', payload));
  if (!parsed.success) {
    throw new InvalidResponseShapeError('FUNDGZ', 'unexpected valuation fields');
  }

  const data = parsed.data;
  const nav = Number(data.dwjz);
  if (nav <= 0) {
    throw new InvalidResponseShapeError('FUNDGZ', `non-positive NAV ${data.dwjz}`);
  }

  return {
    fundCode: data.fundcode,
    name: data.name,
    navDate: data.jzrq,
    nav,
    estimatedNav: data.gsz !== undefined ? Number(data.gsz) : undefined,
    estimatedChangePct: data.gszzl !== undefined ? Number(data.gszzl) : undefined,
    valuationTime: data.gztime,
  };
}
