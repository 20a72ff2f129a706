import { type Logger, pino } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * The library's default logger. Silent unless a level is given.
 */
export function createLogger(level: LogLevel = 'silent'): Logger {
  return pino({ name: 'shard-metrics', level });
}
