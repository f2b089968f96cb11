import type { AlertEvent, CycleReport, Rule } from './types.js';
import { RULE_LABELS } from './constants.market.js';

const formatNumber = (num: number, decimals: number = 2) =>
  new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 0,
    maximumFractionDigits: decimals,
  }).format(num);

// Sub-dollar coins (PEPE ~1e-5) need significant digits, not fixed decimals
const subDollarFormat = new Intl.NumberFormat('en-US', { maximumSignificantDigits: 6 });

export function formatPrice(price: number): string {
  return price < 1 ? subDollarFormat.format(price) : price.toFixed(2);
}

export function formatVolume(volume: number): string {
  return formatNumber(Math.round(volume), 0);
}

function formatUtcTime(timestamp: number): string {
  const d = new Date(timestamp);
  const hh = String(d.getUTCHours()).padStart(2, '0');
  const mm = String(d.getUTCMinutes()).padStart(2, '0');
  return `${hh}:${mm} UTC`;
}

export function formatAlert(event: AlertEvent): string {
  const { emoji, label } = RULE_LABELS[event.kind];

  return [
    `${emoji} *${label}: ${Math.abs(event.percentChange).toFixed(2)}%* (${event.symbol})`,
    `💰 Price: ${formatPrice(event.currentPrice)} (from ${formatPrice(event.baselinePrice)})`,
    `📊 Volume: $${formatVolume(event.volume)}`,
    `⏱️ ${formatUtcTime(event.timestamp)}`,
  ].join('\n');
}

export function formatRule(rule: Rule): string {
  const { emoji, label } = RULE_LABELS[rule.kind];
  const state = rule.thresholdPercent > 0 ? '' : ' (off)';
  return `${emoji} ${label}: ${rule.thresholdPercent}% in ${rule.lookbackMinutes} min${state}`;
}

export function formatCycleReport(report: CycleReport): string {
  const seconds = ((report.finishedAt - report.startedAt) / 1000).toFixed(1);
  return [
    `🔁 Last cycle: ${new Date(report.startedAt).toISOString()} (${seconds}s)`,
    `✅ Checked: ${report.checked}`,
    `📉 Low volume: ${report.skippedLowVolume.length}`,
    `⚠️ Failed: ${report.failed.length}`,
    `🔔 Alerts: ${report.alerts.length}`,
  ].join('\n');
}
