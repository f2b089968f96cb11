import { setTimeout as delay } from 'node:timers/promises';
import type { AlertDispatcher, AlertEvent, CycleReport, MarketDataClient, Quote } from './types.js';
import type { ScreenerSettings } from '../core/settings.js';
import { PriceHistoryStore } from './priceHistory.js';
import { SignalEvaluator } from './signalEvaluator.js';
import { validateQuote } from './quote.js';
import { HISTORY_RETENTION_MS, INTERVALS } from './constants.market.js';
import { createScopedLogger, type ScopedLogger, type WatcherLogWriters } from './logging.js';
import type { EventLogger } from './logger.js';

export interface MarketWatcherOptions {
  client: MarketDataClient;
  dispatcher: AlertDispatcher;
  settings: ScreenerSettings;
  history?: PriceHistoryStore;
  intervalMs?: number;
  symbolDelayMs?: number;
  retentionMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logWriters?: WatcherLogWriters;
  onEvent?: EventLogger;
}

const noopEvent: EventLogger = () => {};

/**
 * Polls the watchlist one symbol at a time, feeds the price history and hands
 * every fired rule to the dispatcher. Symbols are never fetched in parallel:
 * the delay between them is what keeps us under the exchange rate limit.
 */
export class MarketWatcher {
  readonly history: PriceHistoryStore;

  private readonly evaluator: SignalEvaluator;
  private readonly log: ScopedLogger;
  private readonly intervalMs: number;
  private readonly symbolDelayMs: number;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onEvent: EventLogger;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private stopping = false;
  private lastReport: CycleReport | null = null;

  constructor(private readonly options: MarketWatcherOptions) {
    this.history = options.history ?? new PriceHistoryStore();
    this.evaluator = new SignalEvaluator(this.history, options.settings.rules);
    this.log = createScopedLogger('[WATCHER]', options.logWriters);
    this.intervalMs = options.intervalMs ?? INTERVALS.ONE_MIN;
    this.symbolDelayMs = options.symbolDelayMs ?? INTERVALS.HALF_SECOND;
    this.retentionMs = options.retentionMs ?? HISTORY_RETENTION_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.onEvent = options.onEvent ?? noopEvent;
  }

  // =====================
  // Scheduling
  // =====================
  start() {
    if (this.timer) {
      this.log.info('✅ Watcher already running');
      return;
    }
    this.stopping = false;
    this.log.info(
      `🚀 Watching ${this.options.settings.watchlist.size} symbols on ${this.options.client.exchange} every ${this.intervalMs / 1000}s`
    );
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.tick();
  }

  /**
   * No new cycles after this call. A cycle in progress finishes the symbol it
   * is on and the returned promise resolves once it has wound down.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.stopping = true;
    if (this.inFlight) {
      await this.inFlight;
    }
    this.log.info('🛑 Watcher stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  isCycleInProgress(): boolean {
    return this.inFlight !== null;
  }

  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  private tick() {
    if (this.inFlight) {
      this.log.warn('Previous cycle still running, skipping this tick');
      return;
    }

    this.inFlight = this.runCycle()
      .then(() => undefined)
      .catch(err => {
        this.log.error('Cycle crashed:', err);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  // =====================
  // One scan
  // =====================
  async runCycle(): Promise<CycleReport> {
    const { watchlist } = this.options.settings;
    // snapshot: symbols added mid-cycle are picked up on the next one
    const symbols = watchlist.symbols();

    const report: CycleReport = {
      startedAt: this.now(),
      finishedAt: 0,
      checked: 0,
      skippedLowVolume: [],
      failed: [],
      alerts: [],
      interrupted: false,
    };

    this.log.info(`🔁 Checking ${symbols.length} symbols: ${symbols.join(', ')}`);

    for (const [i, symbol] of symbols.entries()) {
      if (this.stopping) {
        report.interrupted = true;
        break;
      }

      const alerts = await this.processSymbol(symbol, report);
      report.alerts.push(...alerts);

      if (i < symbols.length - 1 && this.symbolDelayMs > 0) {
        await this.sleep(this.symbolDelayMs);
      }
    }

    report.finishedAt = this.now();
    this.lastReport = report;

    this.onEvent({
      type: 'cycle',
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      checked: report.checked,
      skippedLowVolume: report.skippedLowVolume,
      failed: report.failed,
      alerts: report.alerts.length,
      interrupted: report.interrupted,
    });

    return report;
  }

  private async processSymbol(symbol: string, report: CycleReport): Promise<AlertEvent[]> {
    const quote = await this.fetchQuote(symbol);
    if (!quote) {
      report.failed.push(symbol);
      return [];
    }

    const minVolume = this.options.settings.watchlist.minVolumeFor(symbol);
    if (quote.volume < minVolume) {
      report.skippedLowVolume.push(symbol);
      this.log.info(`📉 ${symbol} skipped: volume ${Math.round(quote.volume)} < ${minVolume}`);
      return [];
    }

    const now = this.now();
    this.history.record(symbol, { timestamp: now, price: quote.price }, this.retentionMs);
    report.checked++;

    const alerts = this.evaluator.evaluate({
      symbol,
      now,
      price: quote.price,
      volume: quote.volume,
    });

    for (const alert of alerts) {
      await this.dispatch(alert);
    }

    return alerts;
  }

  private async fetchQuote(symbol: string): Promise<Quote | null> {
    try {
      return validateQuote(symbol, await this.options.client.fetchQuote(symbol));
    } catch (err) {
      this.log.warn(`${symbol} skipped, fetch failed:`, err);
      return null;
    }
  }

  private async dispatch(alert: AlertEvent) {
    this.onEvent({ type: 'alert', ...alert });
    try {
      await this.options.dispatcher.deliver(alert);
      this.log.info(`✅ Signal sent: ${alert.kind} ${alert.symbol} ${alert.percentChange.toFixed(2)}%`);
    } catch (err) {
      // потерянный алерт не повод останавливать цикл
      this.log.error(`Alert delivery failed (${alert.kind} ${alert.symbol}):`, err);
    }
  }
}
