import { DEFAULT_MIN_VOLUME_USD, DEFAULT_WATCHLIST, QUOTE_ASSET } from './constants.market.js';
import { SettingsError } from '../core/errors.js';

export interface AddSymbolsResult {
  added: string[];
  skipped: string[];
  invalid: string[];
}

// btc -> BTCUSDT, ethusdt -> ETHUSDT
export function normalizeSymbol(input: string): string | undefined {
  const base = input.trim().toUpperCase().replace(new RegExp(QUOTE_ASSET, 'g'), '');
  if (!base || !/^[A-Z0-9]+$/.test(base)) return undefined;
  return `${base}${QUOTE_ASSET}`;
}

function assertVolume(value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new SettingsError(`Minimum volume must be a non-negative number, got ${value}`);
  }
}

export class Watchlist {
  // Set keeps insertion order, which is the polling order
  private readonly entries = new Set<string>();
  private readonly volumeOverrides = new Map<string, number>();
  private minVolume: number;

  constructor(
    symbols: readonly string[] = DEFAULT_WATCHLIST,
    minVolume: number = DEFAULT_MIN_VOLUME_USD
  ) {
    assertVolume(minVolume);
    this.minVolume = minVolume;
    this.addMany(symbols);
  }

  add(input: string): boolean {
    const symbol = normalizeSymbol(input);
    if (!symbol || this.entries.has(symbol)) return false;
    this.entries.add(symbol);
    return true;
  }

  addMany(inputs: readonly string[]): AddSymbolsResult {
    const result: AddSymbolsResult = { added: [], skipped: [], invalid: [] };
    for (const input of inputs) {
      const symbol = normalizeSymbol(input);
      if (!symbol) {
        result.invalid.push(input);
      } else if (this.add(symbol)) {
        result.added.push(symbol);
      } else {
        result.skipped.push(symbol);
      }
    }
    return result;
  }

  remove(input: string): boolean {
    const symbol = normalizeSymbol(input);
    if (!symbol) return false;
    this.volumeOverrides.delete(symbol);
    return this.entries.delete(symbol);
  }

  contains(input: string): boolean {
    const symbol = normalizeSymbol(input);
    return symbol !== undefined && this.entries.has(symbol);
  }

  symbols(): string[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.size;
  }

  minVolumeFor(symbol: string): number {
    return this.volumeOverrides.get(symbol) ?? this.minVolume;
  }

  getMinVolume(): number {
    return this.minVolume;
  }

  setMinVolume(value: number): number {
    assertVolume(value);
    this.minVolume = value;
    return value;
  }

  setMinVolumeFor(input: string, value: number): void {
    assertVolume(value);
    const symbol = normalizeSymbol(input);
    if (!symbol) throw new SettingsError(`Invalid symbol: ${input}`);
    this.volumeOverrides.set(symbol, value);
  }
}
