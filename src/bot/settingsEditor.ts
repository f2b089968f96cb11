import type { RuleField, RuleKind } from '../market/types.js';
import type { ScreenerSettings } from '../core/settings.js';
import { formatRule, formatVolume } from '../market/format.js';
import { SettingsError } from '../core/errors.js';

export const SETTING_KEYS = [
  'set_pump_period',
  'set_pump_percent',
  'set_short_period',
  'set_short_percent',
  'set_dump_period',
  'set_dump_percent',
  'set_min_volume',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

type SettingTarget = { kind: RuleKind; field: RuleField } | 'minVolume';

const SETTING_TARGETS: Record<SettingKey, SettingTarget> = {
  set_pump_period: { kind: 'PUMP', field: 'lookbackMinutes' },
  set_pump_percent: { kind: 'PUMP', field: 'thresholdPercent' },
  set_short_period: { kind: 'SHORT', field: 'lookbackMinutes' },
  set_short_percent: { kind: 'SHORT', field: 'thresholdPercent' },
  set_dump_period: { kind: 'DUMP', field: 'lookbackMinutes' },
  set_dump_percent: { kind: 'DUMP', field: 'thresholdPercent' },
  set_min_volume: 'minVolume',
};

export const SETTING_PROMPTS: Record<SettingKey, string> = {
  set_pump_period: 'pump period (min)',
  set_pump_percent: 'pump percent (%)',
  set_short_period: 'short period (min)',
  set_short_percent: 'short percent (%)',
  set_dump_period: 'dump period (min)',
  set_dump_percent: 'dump percent (%)',
  set_min_volume: 'minimum 24h volume ($)',
};

export function isSettingKey(value: string): value is SettingKey {
  return SETTING_KEYS.some(key => key === value);
}

// "3.5", " 3,5 " -> 3.5; "", "abc", "1e999", "1,000", "1.000,5" -> undefined
export function parseNumericInput(text: string): number | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;
  if ((trimmed.match(/[.,]/g) ?? []).length > 1) return undefined;
  // "1,000" похоже на разделитель тысяч, а не на 1.0
  if (/^-?[1-9]\d*,\d{3}$/.test(trimmed)) return undefined;
  const value = Number(trimmed.replace(',', '.'));
  return Number.isFinite(value) ? value : undefined;
}

export const NOT_A_NUMBER = 'not a number';

export type SettingUpdateResult =
  | { ok: true; key: SettingKey; value: number }
  | { ok: false; key: SettingKey; reason: string };

/**
 * Applies one text reply from the settings dialog. On failure nothing is
 * changed and `reason` is meant for the user.
 */
export function applySettingInput(
  settings: ScreenerSettings,
  key: SettingKey,
  text: string
): SettingUpdateResult {
  const value = parseNumericInput(text);
  if (value === undefined) {
    return { ok: false, key, reason: NOT_A_NUMBER };
  }

  const target = SETTING_TARGETS[key];
  try {
    const stored =
      target === 'minVolume'
        ? settings.watchlist.setMinVolume(value)
        : settings.rules.set(target.kind, target.field, value);
    return { ok: true, key, value: stored };
  } catch (err) {
    if (err instanceof SettingsError) {
      return { ok: false, key, reason: err.message };
    }
    throw err;
  }
}

export function formatSettings(settings: ScreenerSettings): string {
  return [
    '⚙️ Current settings:',
    ...settings.rules.list().map(formatRule),
    `📊 Min volume: $${formatVolume(settings.watchlist.getMinVolume())}`,
  ].join('\n');
}
