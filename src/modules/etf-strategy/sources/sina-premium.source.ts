/**
 * ETF STRATEGY — Sina Premium Source
 *
 * Secondary premium source. One request returns both the exchange quote
 * and the fund NAV line. When the NAV line is missing, the price move is
 * still recorded for the estimator before failing.
 */

import { InvalidResponseShapeError } from '../../../common/errors.js';
import type { SignalClass } from '../etf.types.js';
import { BaseQuoteSource, percentChange, toPositiveNumber } from './base.source.js';
import { premiumPct } from './eastmoney-premium.source.js';
import { exchangeQuoteKey, fundQuoteKey, parseSinaQuotes } from './sina-quote.parser.js';
import type { SignalFetchContext, SourceReading } from './source.types.js';

export const SINA_QUOTE_URL = 'http://hq.sinajs.cn/list=';
const SINA_REFERER = 'https://finance.sina.com.cn/';

// exchange line: name, open, previous close, price, ...
const PREV_CLOSE_FIELD = 2;
const PRICE_FIELD = 3;
// fund line: name, unit NAV, accumulated NAV, ...
const NAV_FIELD = 1;

export class SinaPremiumSource extends BaseQuoteSource {
  readonly id = 'SINA' as const;
  readonly signalClasses: readonly SignalClass[] = ['premium'];

  async fetch(ctx: SignalFetchContext): Promise<SourceReading> {
    const fund = ctx.instrument.fund;
    const exchangeKey = exchangeQuoteKey(fund.exchange, fund.code);
    const navKey = fundQuoteKey(fund.code);

    const body = await this.request(ctx, `${SINA_QUOTE_URL}${exchangeKey},${navKey}`, {
      headers: { Referer: SINA_REFERER },
    });
    const quotes = parseSinaQuotes(body);

    const fields = quotes.get(exchangeKey) ?? [];
    const price = toPositiveNumber(fields[PRICE_FIELD]);
    if (price === null) {
      throw new InvalidResponseShapeError('SINA', `no usable price for ${exchangeKey}`);
    }

    const previousClose = toPositiveNumber(fields[PREV_CLOSE_FIELD]);
    if (previousClose !== null) {
      ctx.observations.priceChangePct = percentChange('SINA', price, previousClose);
    }

    const nav = toPositiveNumber((quotes.get(navKey) ?? [])[NAV_FIELD]);
    if (nav === null) {
      throw new InvalidResponseShapeError('SINA', `no NAV line for ${navKey}`);
    }

    return { value: premiumPct(price, nav), estimated: false };
  }
}
