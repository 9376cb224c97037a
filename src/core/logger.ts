/**
 * Component loggers for the client
 *
 * Every module logs through a child of the shared winston logger, tagged with
 * its component so console lines and stored entries can be filtered.
 */
import type { Logger } from 'winston';
import baseLogger from '../utils/logger';

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

export interface LoggerOptions {
  /** Minimum log level to output */
  level: LogLevel;

  /** Suppresses all output when true */
  silent?: boolean;
}

/**
 * Creates a logger whose entries carry `component`
 *
 * @example
 * const log = createLogger('endpoint.datasources');
 * log.info('Querying all datasources on site');
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}

export const logger = createLogger('client');

/**
 * Configure the shared logger; child loggers follow the change
 */
export function configureLogger(options: Partial<LoggerOptions>): void {
  if (options.level) {
    baseLogger.level = options.level;
  }
  if (options.silent !== undefined) {
    baseLogger.silent = options.silent;
  }
}
