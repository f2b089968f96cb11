// logger.ts
import fs from 'fs';
import path from 'path';

const DEFAULT_LOG_PATH = path.join(process.env.TMPDIR || '/tmp', 'screener.log');

let logPath = DEFAULT_LOG_PATH;

export function setEventLogPath(next: string) {
  logPath = next;
}

export function getEventLogPath(): string {
  return logPath;
}

function ensureLogDir() {
  const dir = path.dirname(logPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export type EventLogger = (data: Record<string, unknown>) => void;

// JSON lines, one per cycle report / alert
export const logEvent: EventLogger = data => {
  try {
    ensureLogDir();

    const line = JSON.stringify({ ts: new Date().toISOString(), ...data }) + '\n';

    fs.appendFile(logPath, line, err => {
      if (err) {
        console.error('[LOGGER ERROR]', err);
      }
    });
  } catch (e) {
    console.error('[LOGGER FATAL]', e);
  }
};
