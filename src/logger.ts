import pino from 'pino';
import { SDK_VERSION } from './version.js';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const baseLogger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'gagiteck-sdk',
    version: SDK_VERSION,
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return baseLogger.child({ module: name });
}

export function generateRequestId(): string {
  return crypto.randomUUID();
}
