import { normalizeSymbol, type AddSymbolsResult, type Watchlist } from '../market/watchlist.js';
import type { CycleReport, ExchangeId } from '../market/types.js';
import { formatCycleReport, formatVolume } from '../market/format.js';

export function formatAddResult(result: AddSymbolsResult): string {
  const lines: string[] = [];
  if (result.added.length) lines.push(`✅ Added: ${result.added.join(', ')}`);
  if (result.skipped.length) lines.push(`⚠️ Already watched: ${result.skipped.join(', ')}`);
  if (result.invalid.length) lines.push(`❌ Invalid: ${result.invalid.join(', ')}`);
  return lines.join('\n') || 'Usage: /add BTC ETH SOL';
}

export function formatRemoveResult(input: string, removed: boolean): string {
  const symbol = normalizeSymbol(input);
  if (!symbol) return `❌ Invalid: ${input}`;
  return removed ? `➖ Removed ${symbol}` : `⚠️ ${symbol} is not in the list`;
}

export function formatWatchlist(watchlist: Watchlist): string {
  const symbols = watchlist.symbols();
  if (!symbols.length) return '📭 Watchlist is empty. Use /add BTC';

  return [
    `👀 Watching ${symbols.length} coins:`,
    ...symbols.map(s => `• ${s} (min vol $${formatVolume(watchlist.minVolumeFor(s))})`),
  ].join('\n');
}

export interface StatusInfo {
  exchange: ExchangeId;
  subscribers: number;
  watched: number;
  intervalMs: number;
  running: boolean;
  lastReport: CycleReport | null;
}

export function formatStatus(info: StatusInfo): string {
  const lines = [
    `${info.running ? '🟢' : '🔴'} Watcher ${info.running ? 'running' : 'stopped'} (${info.exchange})`,
    `👥 Subscribers: ${info.subscribers}`,
    `📊 Watching ${info.watched} coins`,
    `🔄 Updates every ${Math.round(info.intervalMs / 1000)}s`,
  ];
  if (info.lastReport) {
    lines.push('', formatCycleReport(info.lastReport));
  }
  return lines.join('\n');
}
