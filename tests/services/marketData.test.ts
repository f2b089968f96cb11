import { describe, expect, it } from 'vitest';
import { parseBybitTicker } from '../../src/services/bybit.js';
import { parseBinanceTicker } from '../../src/services/binance.js';
import { createMarketDataClient } from '../../src/services/marketData.js';
import { MarketDataError } from '../../src/core/errors.js';

describe('parseBybitTicker', () => {
  it('maps last price, turnover and the 24h change fraction', () => {
    const quote = parseBybitTicker('BTCUSDT', {
      retCode: 0,
      retMsg: 'OK',
      result: {
        list: [
          { symbol: 'BTCUSDT', lastPrice: '65000.5', turnover24h: '1234567.89', price24hPcnt: '0.0125' },
        ],
      },
    });

    expect(quote.symbol).toBe('BTCUSDT');
    expect(quote.price).toBe(65000.5);
    expect(quote.volume).toBe(1234567.89);
    expect(quote.percentChange24h).toBeCloseTo(1.25, 10);
  });

  it('throws on a non-zero retCode', () => {
    expect(() =>
      parseBybitTicker('BTCUSDT', { retCode: 10001, retMsg: 'params error', result: { list: [] } })
    ).toThrow(new MarketDataError('BTCUSDT', 'Bybit retCode 10001: params error'));
  });

  it('throws when the symbol is missing from the list', () => {
    expect(() => parseBybitTicker('BTCUSDT', { retCode: 0, retMsg: 'OK', result: { list: [] } })).toThrow(
      '[BTCUSDT] Bybit returned no ticker'
    );
  });
});

describe('parseBinanceTicker', () => {
  it('maps lastPrice, quoteVolume and priceChangePercent', () => {
    expect(
      parseBinanceTicker('ETHUSDT', {
        symbol: 'ETHUSDT',
        lastPrice: '100.5',
        volume: '999',
        quoteVolume: '2500000',
        priceChangePercent: '-1.2',
      })
    ).toEqual({ symbol: 'ETHUSDT', price: 100.5, volume: 2_500_000, percentChange24h: -1.2 });
  });

  it('rejects malformed payloads', () => {
    expect(() => parseBinanceTicker('ETHUSDT', null)).toThrow(MarketDataError);
    expect(() => parseBinanceTicker('ETHUSDT', [])).toThrow(MarketDataError);
    expect(() => parseBinanceTicker('ETHUSDT', { lastPrice: '1' })).toThrow(
      '[ETHUSDT] Binance ticker is missing lastPrice/quoteVolume'
    );
  });
});

describe('createMarketDataClient', () => {
  it('picks the client for the configured exchange', () => {
    const base = { requestTimeoutMs: 5_000 };
    expect(createMarketDataClient({ ...base, exchange: 'bybit' }).exchange).toBe('bybit');
    expect(createMarketDataClient({ ...base, exchange: 'binance' }).exchange).toBe('binance');
  });
});
