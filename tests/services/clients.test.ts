import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BinanceMarketDataClient } from '../../src/services/binance.js';
import { BybitMarketDataClient } from '../../src/services/bybit.js';
import { MarketDataError } from '../../src/core/errors.js';

const { axiosGet, getTickers } = vi.hoisted(() => ({
  axiosGet: vi.fn(),
  getTickers: vi.fn(),
}));

vi.mock('axios', () => ({ default: { get: axiosGet } }));

vi.mock('bybit-api', () => ({
  RestClientV5: class {
    getTickers = getTickers;
  },
}));

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

beforeEach(() => {
  axiosGet.mockReset();
  getTickers.mockReset();
});

describe('BinanceMarketDataClient.fetchQuote', () => {
  it('requests the 24h ticker with the configured timeout', async () => {
    axiosGet.mockResolvedValue({
      status: 200,
      data: { lastPrice: '0.5', quoteVolume: '2000000', priceChangePercent: '4.5' },
    });

    const quote = await new BinanceMarketDataClient(1_500, 'http://fapi.test').fetchQuote('PEPEUSDT');

    expect(quote).toEqual({ symbol: 'PEPEUSDT', price: 0.5, volume: 2_000_000, percentChange24h: 4.5 });
    expect(axiosGet).toHaveBeenCalledWith(
      'http://fapi.test/fapi/v1/ticker/24hr',
      expect.objectContaining({ params: { symbol: 'PEPEUSDT' }, timeout: 1_500 })
    );
  });

  it('turns a non-200 status into MarketDataError', async () => {
    axiosGet.mockResolvedValue({ status: 503, data: 'Service Unavailable' });

    const err = await captureError(new BinanceMarketDataClient().fetchQuote('BTCUSDT'));

    expect(err).toBeInstanceOf(MarketDataError);
    expect(err).toHaveProperty('message', '[BTCUSDT] Binance responded with HTTP 503');
    expect(err).toHaveProperty('symbol', 'BTCUSDT');
  });

  it('keeps the transport error as cause on timeout', async () => {
    const timeout = new Error('timeout of 5000ms exceeded');
    axiosGet.mockRejectedValue(timeout);

    const err = await captureError(new BinanceMarketDataClient().fetchQuote('BTCUSDT'));

    expect(err).toBeInstanceOf(MarketDataError);
    expect(err).toHaveProperty('message', '[BTCUSDT] Binance request failed');
    expect(err).toHaveProperty('cause', timeout);
  });
});

describe('BybitMarketDataClient.fetchQuote', () => {
  it('asks for the linear ticker and maps it', async () => {
    getTickers.mockResolvedValue({
      retCode: 0,
      retMsg: 'OK',
      result: {
        list: [{ symbol: 'ETHUSDT', lastPrice: '3000', turnover24h: '5000000', price24hPcnt: '0.02' }],
      },
    });

    const quote = await new BybitMarketDataClient().fetchQuote('ETHUSDT');

    expect(getTickers).toHaveBeenCalledWith({ category: 'linear', symbol: 'ETHUSDT' });
    expect(quote.price).toBe(3000);
    expect(quote.volume).toBe(5_000_000);
  });

  it('keeps the transport error as cause when the request is rejected', async () => {
    const unavailable = new Error('Request failed with status code 503');
    getTickers.mockRejectedValue(unavailable);

    const err = await captureError(new BybitMarketDataClient().fetchQuote('ETHUSDT'));

    expect(err).toBeInstanceOf(MarketDataError);
    expect(err).toHaveProperty('message', '[ETHUSDT] Bybit request failed');
    expect(err).toHaveProperty('cause', unavailable);
  });

  it('rejects on an error retCode', async () => {
    getTickers.mockResolvedValue({ retCode: 10006, retMsg: 'Too many visits', result: {} });

    await expect(new BybitMarketDataClient().fetchQuote('ETHUSDT')).rejects.toThrow(
      '[ETHUSDT] Bybit retCode 10006: Too many visits'
    );
  });
});
