/**
 * ETF STRATEGY — Eastmoney Premium Source
 *
 * Primary premium source:
 *   price: push2 quote (f43 last, f60 previous close)
 *   NAV:   fundgz valuation (dwjz)
 *   premium = (price - NAV) / NAV * 100
 */

import { z } from 'zod';
import { InvalidResponseShapeError } from '../../../common/errors.js';
import type { SignalClass } from '../etf.types.js';
import type { InstrumentConfig } from '../strategy.config.js';
import { BaseQuoteSource, parseJsonBody, percentChange, toPositiveNumber } from './base.source.js';
import { parseFundValuation } from './fundgz.parser.js';
import type { SignalFetchContext, SourceReading } from './source.types.js';

export const EASTMONEY_QUOTE_URL = 'http://push2.eastmoney.com/api/qt/stock/get';
export const FUNDGZ_URL = 'http://fundgz.1234567.com.cn/js';

// fltt=2 gives decimals, "-" when there is no trade
const quoteField = z.union([z.number(), z.string()]).optional();

const QuoteResponseSchema = z.object({
  data: z
    .object({
      f43: quoteField,
      f57: quoteField,
      f58: quoteField,
      f60: quoteField,
    })
    .nullable(),
});

export function eastmoneySecId(fund: InstrumentConfig['fund']): string {
  return `${fund.exchange === 'SH' ? 1 : 0}.${fund.code}`;
}

export interface ExchangeQuote {
  price: number;
  previousClose: number | null;
}

export function parseExchangeQuote(body: string): ExchangeQuote {
  const parsed = QuoteResponseSchema.safeParse(parseJsonBody('EASTMONEY', body));
  if (!parsed.success || !parsed.data.data) {
    throw new InvalidResponseShapeError('EASTMONEY', 'missing quote data');
  }

  const price = toPositiveNumber(parsed.data.data.f43);
  if (price === null) {
    throw new InvalidResponseShapeError('EASTMONEY', `no usable price (f43=${String(parsed.data.data.f43)})`);
  }

  return { price, previousClose: toPositiveNumber(parsed.data.data.f60) };
}

export function premiumPct(price: number, nav: number): number {
  return ((price - nav) / nav) * 100;
}

export class EastmoneyPremiumSource extends BaseQuoteSource {
  readonly id = 'EASTMONEY' as const;
  readonly signalClasses: readonly SignalClass[] = ['premium'];

  async fetch(ctx: SignalFetchContext): Promise<SourceReading> {
    const fund = ctx.instrument.fund;

    const quoteBody = await this.request(ctx, EASTMONEY_QUOTE_URL, {
      params: {
        secid: eastmoneySecId(fund),
        fltt: 2,
        invt: 2,
        fields: 'f43,f57,f58,f60',
      },
    });
    const quote = parseExchangeQuote(quoteBody);
    if (quote.previousClose !== null) {
      ctx.observations.priceChangePct = percentChange('EASTMONEY', quote.price, quote.previousClose);
    }

    const navBody = await this.request(ctx, `${FUNDGZ_URL}/${fund.code}.js`, {}, 'FUNDGZ');
    const valuation = parseFundValuation(navBody);

    return { value: premiumPct(quote.price, valuation.nav), estimated: false };
  }
}
