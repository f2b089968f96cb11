import { ThresholdRuleSet } from '../market/thresholds.js';
import { Watchlist } from '../market/watchlist.js';
import type { ScreenerConfig } from '../config/screenerConfig.js';

/**
 * Everything the Telegram surface may edit while the watcher runs. One
 * instance is built at startup and handed to both sides.
 */
export interface ScreenerSettings {
  readonly rules: ThresholdRuleSet;
  readonly watchlist: Watchlist;
}

export function createScreenerSettings(
  config: Pick<ScreenerConfig, 'rules' | 'watchlist' | 'minVolumeUsd'>
): ScreenerSettings {
  return {
    rules: new ThresholdRuleSet(config.rules),
    watchlist: new Watchlist(config.watchlist, config.minVolumeUsd),
  };
}
