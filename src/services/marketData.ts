import type { MarketDataClient } from '../market/types.js';
import type { ScreenerConfig } from '../config/screenerConfig.js';
import { BybitMarketDataClient } from './bybit.js';
import { BinanceMarketDataClient } from './binance.js';

export function createMarketDataClient(
  config: Pick<ScreenerConfig, 'exchange' | 'requestTimeoutMs' | 'bybitApiKey' | 'bybitSecretKey'>
): MarketDataClient {
  switch (config.exchange) {
    case 'binance':
      return new BinanceMarketDataClient(config.requestTimeoutMs);
    case 'bybit':
      return new BybitMarketDataClient({
        key: config.bybitApiKey,
        secret: config.bybitSecretKey,
        timeoutMs: config.requestTimeoutMs,
      });
  }
}
