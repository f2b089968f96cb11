import type { Quote } from './types.js';
import { MarketDataError } from '../core/errors.js';

// Anything that would poison the history (zero price, NaN volume) is treated as a failed fetch.
export function validateQuote(symbol: string, quote: Quote): Quote {
  if (!Number.isFinite(quote.price) || quote.price <= 0) {
    throw new MarketDataError(symbol, `invalid price ${quote.price}`);
  }
  if (!Number.isFinite(quote.volume) || quote.volume < 0) {
    throw new MarketDataError(symbol, `invalid volume ${quote.volume}`);
  }
  if (!Number.isFinite(quote.percentChange24h)) {
    throw new MarketDataError(symbol, `invalid 24h change ${quote.percentChange24h}`);
  }
  return quote;
}
