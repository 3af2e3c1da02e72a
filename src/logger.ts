import { pino } from 'pino';
import type { Logger, LevelWithSilentOrString } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilentOrString;
}

/**
 * Library-wide pino logger. Silent unless a level is passed or
 * ODATA_LOG_LEVEL is set in the environment.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['ODATA_LOG_LEVEL'] ?? 'silent';
  return pino({ name: 'odata-query-client', level });
}
