/**
 * ETF STRATEGY — Sina Quote Parser
 *
 * Lines look like `var hq_str_sh513500="name,open,prev,price,...";`.
 * Parsed by delimiters into key -> comma-separated fields.
 */

const LINE_PREFIX = 'var hq_str_';
const VALUE_OPEN = '="';
const VALUE_CLOSE = '";';

export function parseSinaQuotes(body: string): Map<string, string[]> {
  const quotes = new Map<string, string[]>();

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith(LINE_PREFIX)) continue;

    const eq = line.indexOf(VALUE_OPEN, LINE_PREFIX.length);
    if (eq < 0 || !line.endsWith(VALUE_CLOSE)) continue;

    const key = line.slice(LINE_PREFIX.length, eq);
    const value = line.slice(eq + VALUE_OPEN.length, line.length - VALUE_CLOSE.length);
    if (!key || value.includes('"')) continue;

    quotes.set(key, value === '' ? [] : value.split(','));
  }

  return quotes;
}

export function exchangeQuoteKey(exchange: 'SH' | 'SZ', code: string): string {
  return `${exchange.toLowerCase()}${code}`;
}

export function fundQuoteKey(code: string): string {
  return `f_${code}`;
}
