/**
 * ETF STRATEGY — Yahoo Chart Source
 *
 * Primary source for index and futures change percent.
 * Reads `chart.result[0].meta` of the v8 chart endpoint.
 */

import { z } from 'zod';
import { InvalidResponseShapeError } from '../../../common/errors.js';
import type { SignalClass } from '../etf.types.js';
import { BaseQuoteSource, parseJsonBody, percentChange } from './base.source.js';
import type { SignalFetchContext, SourceReading } from './source.types.js';

export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const ChartMetaSchema = z.object({
  regularMarketPrice: z.number(),
  previousClose: z.number().optional(),
  chartPreviousClose: z.number().optional(),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({ meta: ChartMetaSchema })).min(1),
  }),
});

export class YahooChartSource extends BaseQuoteSource {
  readonly id = 'YAHOO' as const;
  readonly signalClasses: readonly SignalClass[] = ['index', 'futures'];

  async fetch(ctx: SignalFetchContext): Promise<SourceReading> {
    const symbol = yahooSymbol(ctx);
    const body = await this.request(ctx, `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`, {
      params: { range: '1d', interval: '1d' },
    });

    return { value: parseChartChange(body), estimated: false };
  }
}

function yahooSymbol(ctx: SignalFetchContext): string {
  if (ctx.signalClass === 'index') return ctx.instrument.index.yahoo;
  if (ctx.signalClass === 'futures') return ctx.instrument.futures.yahoo;
  throw new InvalidResponseShapeError('YAHOO', `signal class "${ctx.signalClass}" is not served`);
}

/**
 * Change percent from a chart payload
 */
export function parseChartChange(body: string): number {
  const parsed = ChartResponseSchema.safeParse(parseJsonBody('YAHOO', body));
  if (!parsed.success) {
    throw new InvalidResponseShapeError('YAHOO', 'missing chart.result[0].meta');
  }

  const meta = parsed.data.chart.result[0].meta;
  return percentChange('YAHOO', meta.regularMarketPrice, meta.previousClose ?? meta.chartPreviousClose);
}
