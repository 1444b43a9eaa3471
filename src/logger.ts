import { destination, pino } from 'pino';
import type { Logger } from 'pino';

import { LOG_FORMATS, LOG_LEVELS } from './config.js';
import type { LogFormat, LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to pretty when stderr is a terminal */
  format?: LogFormat;
}

/**
 * Build a logger writing to stderr, leaving stdout to summaries and tag
 * listings.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const format = options.format ?? (process.stderr.isTTY ? 'pretty' : 'json');

  if (format === 'pretty') {
    return pino({
      level,
      base: undefined,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ level, base: { app: 'exifsweep' } }, destination({ dest: 2, sync: true }));
}

export const logger = createLogger({
  level: LOG_LEVELS.find(level => level === process.env['LOG_LEVEL']),
  format: LOG_FORMATS.find(format => format === process.env['LOG_FORMAT']),
});
