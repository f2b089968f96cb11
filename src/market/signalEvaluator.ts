import type { AlertEvent, Rule } from './types.js';
import type { PriceHistoryStore } from './priceHistory.js';
import type { ThresholdRuleSet } from './thresholds.js';
import { isRuleEnabled } from './thresholds.js';
import { INTERVALS } from './constants.market.js';

export interface EvaluationInput {
  symbol: string;
  now: number;
  price: number;
  volume: number;
}

// Signed % move from baseline to price, or null when the direction does not match the rule.
export function directionalChange(rule: Rule, price: number, baseline: number): number | null {
  if (rule.kind === 'DUMP') {
    if (price >= baseline) return null;
    return ((baseline - price) / baseline) * 100;
  }
  if (price <= baseline) return null;
  return ((price - baseline) / baseline) * 100;
}

export class SignalEvaluator {
  constructor(
    private readonly history: PriceHistoryStore,
    private readonly rules: ThresholdRuleSet
  ) {}

  /**
   * Checks PUMP, SHORT and DUMP independently against the last sample at or
   * before each rule's lookback boundary. Several rules may fire at once and
   * a sustained move fires again on every cycle.
   */
  evaluate({ symbol, now, price, volume }: EvaluationInput): AlertEvent[] {
    const events: AlertEvent[] = [];

    for (const rule of this.rules.list()) {
      if (!isRuleEnabled(rule)) continue;

      const cutoff = now - rule.lookbackMinutes * INTERVALS.ONE_MIN;
      const baseline = this.history.baselineAtOrBefore(symbol, cutoff);
      if (!baseline) continue;

      const pct = directionalChange(rule, price, baseline.price);
      if (pct === null || pct < rule.thresholdPercent) continue;

      events.push({
        symbol,
        kind: rule.kind,
        currentPrice: price,
        baselinePrice: baseline.price,
        percentChange: rule.kind === 'DUMP' ? -pct : pct,
        volume,
        timestamp: now,
      });
    }

    return events;
  }
}
