import axios, { type AxiosResponse } from 'axios';
import type { MarketDataClient, Quote } from '../market/types.js';
import { MarketDataError } from '../core/errors.js';
import { INTERVALS } from '../market/constants.market.js';

const BINANCE_FUTURES_URL = 'https://fapi.binance.com';

function readNumber(data: Record<string, unknown>, field: string): number {
  const raw = data[field];
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && raw.trim()) return Number(raw);
  return NaN;
}

/**
 * Maps a USD-M futures /fapi/v1/ticker/24hr payload. Volume is the quote
 * turnover (`quoteVolume`), not the base-asset `volume`.
 */
export function parseBinanceTicker(symbol: string, data: unknown): Quote {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new MarketDataError(symbol, 'Binance returned a malformed ticker');
  }
  const row: Record<string, unknown> = { ...data };

  const quote: Quote = {
    symbol,
    price: readNumber(row, 'lastPrice'),
    volume: readNumber(row, 'quoteVolume'),
    percentChange24h: readNumber(row, 'priceChangePercent'),
  };

  if (Number.isNaN(quote.price) || Number.isNaN(quote.volume)) {
    throw new MarketDataError(symbol, 'Binance ticker is missing lastPrice/quoteVolume');
  }
  return quote;
}

export class BinanceMarketDataClient implements MarketDataClient {
  readonly exchange = 'binance' as const;

  constructor(
    private readonly timeoutMs: number = INTERVALS.FIVE_SEC,
    private readonly baseUrl: string = BINANCE_FUTURES_URL
  ) {}

  async fetchQuote(symbol: string): Promise<Quote> {
    let response: AxiosResponse<unknown>;
    try {
      response = await axios.get<unknown>(`${this.baseUrl}/fapi/v1/ticker/24hr`, {
        params: { symbol },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new MarketDataError(symbol, 'Binance request failed', { cause: error });
    }

    if (response.status !== 200) {
      throw new MarketDataError(symbol, `Binance responded with HTTP ${response.status}`);
    }
    return parseBinanceTicker(symbol, response.data);
  }
}
