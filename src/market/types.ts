export type RuleKind = 'PUMP' | 'SHORT' | 'DUMP';

export type RuleField = 'thresholdPercent' | 'lookbackMinutes';

export interface Rule {
  kind: RuleKind;
  thresholdPercent: number; // <= 0 means the rule is off
  lookbackMinutes: number;
}

export interface PriceSample {
  readonly timestamp: number; // ms
  readonly price: number;
}

export interface Quote {
  symbol: string;
  price: number;
  volume: number; // 24h turnover in quote currency
  percentChange24h: number;
}

export interface AlertEvent {
  symbol: string;
  kind: RuleKind;
  currentPrice: number;
  baselinePrice: number;
  percentChange: number; // signed: negative for DUMP
  volume: number;
  timestamp: number;
}

export type ExchangeId = 'bybit' | 'binance';

export interface MarketDataClient {
  readonly exchange: ExchangeId;
  fetchQuote(symbol: string): Promise<Quote>;
}

export interface AlertDispatcher {
  deliver(event: AlertEvent): Promise<void>;
}

export interface CycleReport {
  startedAt: number;
  finishedAt: number;
  checked: number;
  skippedLowVolume: string[];
  failed: string[];
  alerts: AlertEvent[];
  interrupted: boolean;
}
