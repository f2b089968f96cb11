export type WatcherLogWriter = (line: string) => void;
export type WatcherLogger = (...args: unknown[]) => void;

export function formatWatcherLogArgs(args: unknown[]): string {
  return args
    .map(arg => {
      if (arg instanceof Error) {
        const cause = arg.cause instanceof Error ? ` (cause: ${arg.cause.message})` : '';
        return `${arg.name}: ${arg.message}${cause}`;
      }
      if (typeof arg === 'string') return arg;
      if (typeof arg === 'number' || typeof arg === 'boolean') return String(arg);
      if (arg === null) return 'null';
      if (arg === undefined) return 'undefined';
      try {
        return JSON.stringify(arg);
      } catch {
        return '[Unserializable]';
      }
    })
    .join(' ');
}

const noopLogger: WatcherLogger = () => {};

export function createWatcherLogger(
  writer: WatcherLogWriter | undefined,
  scope?: string
): WatcherLogger {
  if (!writer) {
    return noopLogger;
  }
  return (...args: unknown[]) => {
    const payload = formatWatcherLogArgs(args);
    writer(scope ? `${scope} ${payload}` : payload);
  };
}

export interface WatcherLogWriters {
  info?: WatcherLogWriter;
  warn?: WatcherLogWriter;
  error?: WatcherLogWriter;
}

export interface ScopedLogger {
  info: WatcherLogger;
  warn: WatcherLogger;
  error: WatcherLogger;
}

export const consoleWriters: Required<WatcherLogWriters> = {
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

export function createScopedLogger(scope: string, writers: WatcherLogWriters = consoleWriters): ScopedLogger {
  return {
    info: createWatcherLogger(writers.info, scope),
    warn: createWatcherLogger(writers.warn, `${scope} ⚠️`),
    error: createWatcherLogger(writers.error, `${scope} ❌`),
  };
}
