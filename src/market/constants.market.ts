import type { Rule, RuleKind } from './types.js';

// Common intervals in milliseconds
export const INTERVALS = {
  HALF_SECOND: 500,
  FIVE_SEC: 5 * 1000,
  ONE_MIN: 60 * 1000,
  THIRTY_MIN: 30 * 60 * 1000,
} as const;

// Samples older than this are dropped whatever the rules ask for
export const HISTORY_RETENTION_MS = INTERVALS.THIRTY_MIN;

export const RULE_ORDER: readonly RuleKind[] = ['PUMP', 'SHORT', 'DUMP'];

export const DEFAULT_RULES: Record<RuleKind, Rule> = {
  PUMP: { kind: 'PUMP', thresholdPercent: 3, lookbackMinutes: 3 },
  SHORT: { kind: 'SHORT', thresholdPercent: 20, lookbackMinutes: 20 },
  DUMP: { kind: 'DUMP', thresholdPercent: 12, lookbackMinutes: 4 },
};

export const RULE_LABELS: Record<RuleKind, { emoji: string; label: string }> = {
  PUMP: { emoji: '🟢', label: 'Pump' },
  SHORT: { emoji: '🟡', label: 'Short' },
  DUMP: { emoji: '🔴', label: 'Dump' },
};

export const DEFAULT_WATCHLIST = ['BTCUSDT', 'ETHUSDT', 'SOLUSDT', 'PEPEUSDT'] as const;

export const QUOTE_ASSET = 'USDT';

export const DEFAULT_MIN_VOLUME_USD = 1_000_000;

export const MIN_LOOKBACK_MINUTES = 1;
