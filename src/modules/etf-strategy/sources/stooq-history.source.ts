/**
 * ETF STRATEGY — Stooq History Source
 *
 * Secondary source for index and futures. Downloads the daily CSV
 * (Date,Open,High,Low,Close[,Volume]) and compares the last two closes.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { InvalidResponseShapeError } from '../../../common/errors.js';
import type { SignalClass } from '../etf.types.js';
import { BaseQuoteSource, percentChange } from './base.source.js';
import type { SignalFetchContext, SourceReading } from './source.types.js';

export const STOOQ_DAILY_URL = 'https://stooq.com/q/d/l/';

const RowsSchema = z.array(z.record(z.string()));

export class StooqHistorySource extends BaseQuoteSource {
  readonly id = 'STOOQ' as const;
  readonly signalClasses: readonly SignalClass[] = ['index', 'futures'];

  async fetch(ctx: SignalFetchContext): Promise<SourceReading> {
    const symbol = ctx.signalClass === 'futures' ? ctx.instrument.futures.stooq : ctx.instrument.index.stooq;
    const body = await this.request(ctx, STOOQ_DAILY_URL, {
      params: { s: symbol, i: 'd' },
      headers: { Accept: 'text/csv,*/*' },
    });

    return { value: parseDailyCsvChange(body), estimated: false };
  }
}

/**
 * Change percent between the two most recent closes
 */
export function parseDailyCsvChange(csv: string): number {
  // Stooq answers "No data" or "Exceeded the daily hits limit" as plain text
  if (!csv.includes(',')) {
    throw new InvalidResponseShapeError('STOOQ', `not a CSV payload: ${csv.trim().slice(0, 80)}`);
  }

  let records: unknown;
  try {
    records = parse(csv, {
      columns: (header: string[]) => header.map(h => h.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch {
    throw new InvalidResponseShapeError('STOOQ', 'malformed CSV');
  }

  const rows = RowsSchema.safeParse(records);
  if (!rows.success) {
    throw new InvalidResponseShapeError('STOOQ', 'unexpected CSV rows');
  }

  const closes = rows.data
    .filter(row => row.date && row.close !== undefined)
    .sort((a, b) => a.date.localeCompare(b.date));

  if (closes.length < 2) {
    throw new InvalidResponseShapeError('STOOQ', `need two closes, got ${closes.length}`);
  }

  const last = closes[closes.length - 1];
  const prev = closes[closes.length - 2];
  return percentChange('STOOQ', last.close, prev.close);
}
