// Transient: timeout, bad status or malformed ticker payload. The watcher skips the symbol.
export class MarketDataError extends Error {
  constructor(
    readonly symbol: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${symbol}] ${message}`, options);
    this.name = 'MarketDataError';
  }
}

// Rejected user input. The previous value stays in place.
export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

// Missing or invalid startup parameters. Fatal.
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}
