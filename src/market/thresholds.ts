import type { Rule, RuleField, RuleKind } from './types.js';
import { DEFAULT_RULES, MIN_LOOKBACK_MINUTES, RULE_ORDER } from './constants.market.js';
import { SettingsError } from '../core/errors.js';

export function isRuleEnabled(rule: Rule): boolean {
  return rule.thresholdPercent > 0;
}

/**
 * Runtime-editable pump/short/dump rules. Each update swaps in a fresh frozen
 * object, so a reader holding a rule never sees half of an edit.
 */
export class ThresholdRuleSet {
  private readonly rules = new Map<RuleKind, Readonly<Rule>>();

  constructor(initial: Partial<Record<RuleKind, Omit<Rule, 'kind'>>> = {}) {
    for (const kind of RULE_ORDER) {
      const base = { ...DEFAULT_RULES[kind], ...initial[kind], kind };
      this.rules.set(kind, Object.freeze(base));
      // прогоняем через те же проверки, что и пользовательский ввод
      this.set(kind, 'lookbackMinutes', base.lookbackMinutes);
      this.set(kind, 'thresholdPercent', base.thresholdPercent);
    }
  }

  get(kind: RuleKind): Readonly<Rule> {
    const rule = this.rules.get(kind);
    if (!rule) {
      throw new Error(`Unknown rule kind: ${kind}`);
    }
    return rule;
  }

  list(): Readonly<Rule>[] {
    return RULE_ORDER.map(kind => this.get(kind));
  }

  /**
   * Returns the value actually stored: periods are truncated and clamped to
   * at least one minute, percentages are kept as given.
   */
  set(kind: RuleKind, field: RuleField, value: number): number {
    if (!Number.isFinite(value)) {
      throw new SettingsError(`${kind} ${field} must be a finite number, got ${value}`);
    }

    const stored =
      field === 'lookbackMinutes' ? Math.max(MIN_LOOKBACK_MINUTES, Math.trunc(value)) : value;

    this.rules.set(kind, Object.freeze({ ...this.get(kind), [field]: stored }));
    return stored;
  }
}
