import type { PriceSample } from './types.js';
import { HISTORY_RETENTION_MS } from './constants.market.js';

/**
 * Rolling per-symbol price log. Samples arrive from a single sequential loop,
 * so each history is already sorted by timestamp and pruning only ever cuts
 * from the front.
 */
export class PriceHistoryStore {
  private readonly store = new Map<string, PriceSample[]>();

  append(symbol: string, sample: PriceSample): void {
    let history = this.store.get(symbol);
    if (!history) {
      history = [];
      this.store.set(symbol, history);
    }
    history.push(Object.freeze({ timestamp: sample.timestamp, price: sample.price }));
  }

  /**
   * Drops every sample with `timestamp <= now - retentionMs`.
   * Returns how many samples were removed.
   */
  prune(symbol: string, now: number, retentionMs: number = HISTORY_RETENTION_MS): number {
    if (!Number.isFinite(retentionMs) || retentionMs < 0) {
      throw new RangeError(`Invalid retention window: ${retentionMs}`);
    }

    const history = this.store.get(symbol);
    if (!history) return 0;

    const cutoff = now - retentionMs;
    let stale = 0;
    for (const sample of history) {
      if (sample.timestamp > cutoff) break;
      stale++;
    }
    if (stale > 0) history.splice(0, stale);

    return stale;
  }

  // append + prune at the sample's own time
  record(symbol: string, sample: PriceSample, retentionMs: number = HISTORY_RETENTION_MS): void {
    this.append(symbol, sample);
    this.prune(symbol, sample.timestamp, retentionMs);
  }

  /**
   * Last observation at or before the cutoff. No interpolation: when nothing
   * predates the cutoff the caller gets `undefined` and simply does not fire.
   */
  baselineAtOrBefore(symbol: string, cutoff: number): PriceSample | undefined {
    const history = this.store.get(symbol);
    if (!history || history.length === 0) return undefined;

    // история отсортирована, ищем последний индекс с timestamp <= cutoff
    let lo = 0;
    let hi = history.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const sample = history[mid];
      if (sample && sample.timestamp <= cutoff) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    return found === -1 ? undefined : history[found];
  }

  getSamples(symbol: string): readonly PriceSample[] {
    return [...(this.store.get(symbol) ?? [])];
  }

  size(symbol: string): number {
    return this.store.get(symbol)?.length ?? 0;
  }

  symbols(): string[] {
    return [...this.store.keys()];
  }
}
