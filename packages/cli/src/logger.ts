/**
 * Logging
 *
 * pino writing to stderr, so stdout stays reserved for the summary,
 * tables and JSON output. Pretty-printed when stderr is a terminal.
 *
 * @module packages/cli/logger
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * Map the net verbosity (`-v` count minus `-q` count) to a log level.
 */
export function verbosityToLevel(verbosity: number): LogLevel {
  if (verbosity <= -2) return 'silent';
  if (verbosity === -1) return 'error';
  if (verbosity === 0) return 'warn';
  if (verbosity === 1) return 'info';
  if (verbosity === 2) return 'debug';
  return 'trace';
}

export interface CreateLoggerOptions {
  /** Explicit level; overrides verbosity */
  level?: LogLevel;
  verbosity?: number;
  /** Defaults to whether stderr is a terminal */
  pretty?: boolean;
}

/**
 * Create the process logger.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? verbosityToLevel(options.verbosity ?? 0);
  const pretty = options.pretty ?? process.stderr.isTTY === true;

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2, sync: true, ignore: 'pid,hostname' },
      },
    });
  }

  return pino({ level }, pino.destination({ dest: 2, sync: true }));
}

/**
 * Logger that discards everything, for tests and library callers
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
