import path from 'path';
import type { ExchangeId, Rule, RuleKind } from '../market/types.js';
import {
  DEFAULT_MIN_VOLUME_USD,
  DEFAULT_RULES,
  DEFAULT_WATCHLIST,
  INTERVALS,
} from '../market/constants.market.js';
import { ConfigError } from '../core/errors.js';

export const SCREENER_CONFIG = {
  watcher: {
    checkIntervalSeconds: 60,
    minCheckIntervalSeconds: 5,
    symbolDelayMs: INTERVALS.HALF_SECOND,
    requestTimeoutMs: INTERVALS.FIVE_SEC,
  },
  exchange: 'bybit',
  minVolumeUsd: DEFAULT_MIN_VOLUME_USD,
  watchlist: DEFAULT_WATCHLIST,
  rules: DEFAULT_RULES,
  logFile: 'screener.log',
} as const;

export interface ScreenerConfig {
  botToken: string;
  adminChatId: number;
  exchange: ExchangeId;
  minVolumeUsd: number;
  checkIntervalMs: number;
  symbolDelayMs: number;
  requestTimeoutMs: number;
  watchlist: string[];
  rules: Record<RuleKind, Omit<Rule, 'kind'>>;
  logPath: string;
  bybitApiKey?: string;
  bybitSecretKey?: string;
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseExchange(value: string | undefined): ExchangeId | undefined {
  const normalized = (value?.trim() || SCREENER_CONFIG.exchange).toLowerCase();
  if (normalized === 'bybit' || normalized === 'binance') {
    return normalized;
  }
  return undefined;
}

function parseWatchlist(value: string | undefined): string[] {
  if (!value) {
    return [...SCREENER_CONFIG.watchlist];
  }
  const symbols = value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return symbols.length ? symbols : [...SCREENER_CONFIG.watchlist];
}

function parseRule(env: Env, kind: RuleKind): Omit<Rule, 'kind'> {
  const defaults = SCREENER_CONFIG.rules[kind];
  return {
    thresholdPercent: parseNumber(env[`${kind}_PERCENT`], defaults.thresholdPercent),
    lookbackMinutes: Math.max(
      1,
      parseInteger(env[`${kind}_PERIOD_MINUTES`], defaults.lookbackMinutes)
    ),
  };
}

/**
 * Reads the screener configuration from the environment. Missing BOT_TOKEN or
 * ADMIN_CHAT_ID (or an unknown EXCHANGE) throws a ConfigError listing every
 * problem; other values fall back to defaults when unparseable.
 */
export function loadScreenerConfig(env: Env = process.env): ScreenerConfig {
  const problems: string[] = [];

  const botToken = env.BOT_TOKEN?.trim() ?? '';
  if (!botToken) {
    problems.push('BOT_TOKEN is not set');
  }

  const adminChatId = Number(env.ADMIN_CHAT_ID);
  if (!env.ADMIN_CHAT_ID?.trim()) {
    problems.push('ADMIN_CHAT_ID is not set');
  } else if (!Number.isSafeInteger(adminChatId)) {
    problems.push(`ADMIN_CHAT_ID must be an integer chat id, got "${env.ADMIN_CHAT_ID}"`);
  }

  const exchange = parseExchange(env.EXCHANGE);
  if (!exchange) {
    problems.push(`EXCHANGE must be "bybit" or "binance", got "${env.EXCHANGE}"`);
  }

  if (problems.length || !exchange) {
    throw new ConfigError(problems);
  }

  const checkIntervalSeconds = Math.max(
    SCREENER_CONFIG.watcher.minCheckIntervalSeconds,
    parseInteger(env.CHECK_INTERVAL_SECONDS, SCREENER_CONFIG.watcher.checkIntervalSeconds)
  );

  const minVolumeUsd = parseNumber(env.MIN_VOLUME_USD, SCREENER_CONFIG.minVolumeUsd);

  return {
    botToken,
    adminChatId,
    exchange,
    minVolumeUsd: minVolumeUsd >= 0 ? minVolumeUsd : SCREENER_CONFIG.minVolumeUsd,
    checkIntervalMs: checkIntervalSeconds * 1000,
    symbolDelayMs: Math.max(0, parseInteger(env.SYMBOL_DELAY_MS, SCREENER_CONFIG.watcher.symbolDelayMs)),
    requestTimeoutMs: SCREENER_CONFIG.watcher.requestTimeoutMs,
    watchlist: parseWatchlist(env.WATCHLIST),
    rules: {
      PUMP: parseRule(env, 'PUMP'),
      SHORT: parseRule(env, 'SHORT'),
      DUMP: parseRule(env, 'DUMP'),
    },
    logPath: env.LOG_PATH?.trim() || path.join(env.TMPDIR || '/tmp', SCREENER_CONFIG.logFile),
    bybitApiKey: env.BYBIT_API_KEY || undefined,
    bybitSecretKey: env.BYBIT_SECRET_KEY || undefined,
  };
}
