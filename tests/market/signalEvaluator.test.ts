import { describe, expect, it } from 'vitest';
import { PriceHistoryStore } from '../../src/market/priceHistory.js';
import { ThresholdRuleSet } from '../../src/market/thresholds.js';
import { SignalEvaluator } from '../../src/market/signalEvaluator.js';
import type { Rule, RuleKind } from '../../src/market/types.js';
import { MIN, T } from '../helpers/fakes.js';

const SYMBOL = 'BTCUSDT';
const VOLUME = 5_000_000;

function setup(rules: Partial<Record<RuleKind, Omit<Rule, 'kind'>>> = {}) {
  const history = new PriceHistoryStore();
  const ruleSet = new ThresholdRuleSet(rules);
  const evaluator = new SignalEvaluator(history, ruleSet);
  const at = (minutesAgo: number, price: number) =>
    history.append(SYMBOL, { timestamp: T - minutesAgo * MIN, price });
  const evaluate = (price: number) => evaluator.evaluate({ symbol: SYMBOL, now: T, price, volume: VOLUME });
  return { history, ruleSet, at, evaluate };
}

describe('SignalEvaluator', () => {
  it('fires a pump when the move from the t-5m baseline reaches the threshold', () => {
    const { at, evaluate } = setup({ PUMP: { thresholdPercent: 3, lookbackMinutes: 3 } });
    at(5, 100);

    const events = evaluate(103.1);

    expect(events).toHaveLength(1);
    const [pump] = events;
    expect(pump).toMatchObject({
      symbol: SYMBOL,
      kind: 'PUMP',
      currentPrice: 103.1,
      baselinePrice: 100,
      volume: VOLUME,
      timestamp: T,
    });
    expect(pump?.percentChange).toBeCloseTo(3.1, 10);
  });

  it('stays silent when the pump is below threshold', () => {
    const { at, evaluate } = setup({ PUMP: { thresholdPercent: 3, lookbackMinutes: 3 } });
    at(5, 100);

    expect(evaluate(102.9)).toEqual([]);
  });

  it('fires a dump with a negative signed change', () => {
    const { at, evaluate } = setup({ DUMP: { thresholdPercent: 12, lookbackMinutes: 4 } });
    at(5, 100);

    const events = evaluate(87);

    expect(events.map(e => e.kind)).toEqual(['DUMP']);
    expect(events[0]?.percentChange).toBeCloseTo(-13, 10);
    expect(events[0]?.baselinePrice).toBe(100);
  });

  it('treats a move exactly at the threshold as a hit', () => {
    const pump = setup({
      PUMP: { thresholdPercent: 50, lookbackMinutes: 3 },
      DUMP: { thresholdPercent: 0, lookbackMinutes: 3 },
    });
    pump.at(5, 50);
    expect(pump.evaluate(75).map(e => [e.kind, e.percentChange])).toEqual([['PUMP', 50]]);

    const dump = setup({ DUMP: { thresholdPercent: 25, lookbackMinutes: 4 } });
    dump.at(5, 80);
    expect(dump.evaluate(60).map(e => [e.kind, e.percentChange])).toEqual([['DUMP', -25]]);
  });

  it('uses the last sample at or before the lookback boundary', () => {
    const { at, evaluate } = setup({
      PUMP: { thresholdPercent: 3, lookbackMinutes: 3 },
      SHORT: { thresholdPercent: 0, lookbackMinutes: 20 },
    });
    at(10, 100);
    at(4, 110);
    at(2, 90); // inside the window, ignored

    const events = evaluate(115);

    expect(events).toHaveLength(1);
    expect(events[0]?.baselinePrice).toBe(110);
    expect(events[0]?.percentChange).toBeCloseTo(4.5454545, 6);
  });

  it('lets several rules fire for the same symbol in one pass, in rule order', () => {
    const { at, evaluate } = setup();
    at(25, 100);

    const events = evaluate(130);

    expect(events.map(e => e.kind)).toEqual(['PUMP', 'SHORT']);
    expect(events.every(e => e.baselinePrice === 100)).toBe(true);
  });

  it('never fires a disabled rule, whatever the history holds', () => {
    const { at, evaluate } = setup({
      PUMP: { thresholdPercent: 0, lookbackMinutes: 1 },
      SHORT: { thresholdPercent: -5, lookbackMinutes: 1 },
      DUMP: { thresholdPercent: 0, lookbackMinutes: 1 },
    });
    at(2, 100);

    expect(evaluate(1000)).toEqual([]);
    expect(evaluate(1)).toEqual([]);
  });

  it('respects direction: no pump on a flat or falling price, no dump on a flat or rising one', () => {
    const { at, evaluate } = setup({
      PUMP: { thresholdPercent: 0.0001, lookbackMinutes: 3 },
      SHORT: { thresholdPercent: 0.0001, lookbackMinutes: 3 },
      DUMP: { thresholdPercent: 0.0001, lookbackMinutes: 3 },
    });
    at(5, 100);

    expect(evaluate(100)).toEqual([]);
    expect(evaluate(99).map(e => e.kind)).toEqual(['DUMP']);
    expect(evaluate(101).map(e => e.kind)).toEqual(['PUMP', 'SHORT']);
  });

  it('does not fire until history reaches back past the lookback', () => {
    const { at, evaluate } = setup();
    at(1, 100);

    expect(evaluate(200)).toEqual([]);
  });

  it('picks up rule edits on the next evaluation', () => {
    const { at, evaluate, ruleSet } = setup({ PUMP: { thresholdPercent: 3, lookbackMinutes: 3 } });
    at(5, 100);
    expect(evaluate(102.9)).toEqual([]);

    ruleSet.set('PUMP', 'thresholdPercent', 2.5);

    expect(evaluate(102.9).map(e => e.kind)).toEqual(['PUMP']);
  });
});
