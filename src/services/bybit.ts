import { RestClientV5 } from 'bybit-api';
import type { MarketDataClient, Quote } from '../market/types.js';
import { MarketDataError } from '../core/errors.js';
import { INTERVALS } from '../market/constants.market.js';

interface BybitTickerRow {
  symbol: string;
  lastPrice: string;
  turnover24h: string;
  price24hPcnt: string;
}

export interface BybitTickerResponse {
  retCode: number;
  retMsg: string;
  result?: { list?: BybitTickerRow[] };
}

export interface BybitClientOptions {
  key?: string;
  secret?: string;
  timeoutMs?: number;
  testnet?: boolean;
}

export function parseBybitTicker(symbol: string, response: BybitTickerResponse): Quote {
  if (response.retCode !== 0) {
    throw new MarketDataError(symbol, `Bybit retCode ${response.retCode}: ${response.retMsg}`);
  }

  const ticker = response.result?.list?.find(row => row.symbol === symbol);
  if (!ticker) {
    throw new MarketDataError(symbol, 'Bybit returned no ticker');
  }

  return {
    symbol,
    price: parseFloat(ticker.lastPrice),
    volume: parseFloat(ticker.turnover24h),
    // price24hPcnt приходит долей: 0.0312 = 3.12%
    percentChange24h: parseFloat(ticker.price24hPcnt) * 100,
  };
}

export class BybitMarketDataClient implements MarketDataClient {
  readonly exchange = 'bybit' as const;

  private readonly client: RestClientV5;

  constructor(options: BybitClientOptions = {}) {
    this.client = new RestClientV5(
      {
        key: options.key,
        secret: options.secret,
        testnet: options.testnet ?? false,
      },
      { timeout: options.timeoutMs ?? INTERVALS.FIVE_SEC }
    );
  }

  async fetchQuote(symbol: string): Promise<Quote> {
    let response: BybitTickerResponse;
    try {
      response = await this.client.getTickers({ category: 'linear', symbol });
    } catch (error) {
      throw new MarketDataError(symbol, 'Bybit request failed', { cause: error });
    }
    return parseBybitTicker(symbol, response);
  }
}
