/**
 * CLI Utilities
 *
 * Shared helpers for the epitrend commands: option parsing, color
 * detection, error output and construction of the data service.
 *
 * @module packages/cli/commands/utils
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import ms from 'ms';
import { isEpitrendError } from '@epitrend/core';
import type { ICacheStore } from '@epitrend/core';
import { getConfig } from '../config.js';
import type { Config } from '../config.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { FileCacheStore } from '../cache/index.js';
import { FeedSource, HistoricalCsvSource, HttpClient, PopulationCsvSource } from '../sources/index.js';
import type { FetchLike } from '../sources/index.js';
import { DataService } from '../services/dataService.js';
import { downloadSeries } from '../services/pipeline.js';

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCodes = {
  SUCCESS: 0,
  ERROR: 1,
} as const;

// =============================================================================
// Option Parsing
// =============================================================================

/**
 * Parses a duration such as "1h", "90m" or "10s" into milliseconds
 *
 * Plain numbers are interpreted as milliseconds.
 *
 * @throws Error if the format is invalid or the duration is negative
 */
export function parseDuration(value: string): number {
  const text = value.trim();
  const milliseconds = text === '' ? Number.NaN : ms(text);
  if (typeof milliseconds !== 'number' || Number.isNaN(milliseconds)) {
    throw new Error(`Invalid duration: "${value}". Use e.g. "10s", "30m" or "1h".`);
  }
  if (milliseconds < 0) {
    throw new Error(`Duration must not be negative: "${value}"`);
  }
  return milliseconds;
}

/**
 * Parses a positive day count
 *
 * @throws Error if the value is not a positive integer
 */
export function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new Error(`Invalid day count: "${value}". Use a positive whole number.`);
  }
  return days;
}

/**
 * Adapt a value parser for commander, which reports InvalidArgumentError
 * as a usage error instead of a crash
 */
export function optionParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

/**
 * Accumulator for repeatable flags (`-vvv`)
 */
export function increment(_value: string | undefined, previous: number): number {
  return previous + 1;
}

// =============================================================================
// Terminal
// =============================================================================

/**
 * Checks if colors should be used in output
 *
 * Respects NO_COLOR, TERM=dumb and non-TTY stdout
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Checks if stderr is interactive, for spinners
 */
export function isInteractive(): boolean {
  return process.stderr.isTTY === true && process.env.CI === undefined;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Format an error for the terminal or as JSON.
 */
export function formatError(error: unknown, json: boolean): string {
  if (json) {
    const body = isEpitrendError(error)
      ? error.toJSON()
      : { message: error instanceof Error ? error.message : String(error), code: 'UNKNOWN' };
    return JSON.stringify({ success: false, error: body }, null, 2);
  }

  if (isEpitrendError(error)) {
    return chalk.red(`Error: ${error.toDisplayString()}`);
  }
  return chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Handles errors in CLI commands
 *
 * @param error - Error to handle
 * @param json - Whether to output as JSON
 */
export function handleError(error: unknown, json = false): never {
  if (json) {
    console.log(formatError(error, true));
  } else {
    console.error(formatError(error, false));
  }
  process.exit(ExitCodes.ERROR);
}

// =============================================================================
// Wiring
// =============================================================================

export interface ContextOptions {
  verbosity: number;
  timeoutMs: number;
  config?: Config;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface CommandContext {
  config: Config;
  logger: Logger;
  store: ICacheStore;
  service: DataService;
}

/**
 * Build the collaborators a command needs from configuration.
 *
 * EPITREND_LOG overrides the verbosity flags.
 */
export function createContext(options: ContextOptions): CommandContext {
  const config = options.config ?? getConfig();
  const logger =
    options.logger ?? createLogger({ level: config.logLevel, verbosity: options.verbosity });

  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: options.timeoutMs,
    logger,
    fetchImpl: options.fetchImpl,
  });
  const sources = {
    historical: new HistoricalCsvSource(config.historicalCsvUrl, http, logger),
    feed: new FeedSource({ url: config.feedUrl, pageSize: config.feedPageSize, http, logger }),
    population: new PopulationCsvSource(config.populationUrl, http, logger),
  };

  const store = new FileCacheStore({ dir: config.cacheDir, logger });
  const service = new DataService({
    store,
    logger,
    download: () => downloadSeries(sources, { logger }),
  });

  return { config, logger, store, service };
}
