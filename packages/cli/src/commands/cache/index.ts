/**
 * Cache Command Group
 *
 * Registers the `epitrend cache` command group. The cache subcommands
 * always log at debug level so that cache problems are visible.
 *
 * @module packages/cli/commands/cache
 */

import { Command, Option } from 'commander';
import { createContext, handleError, optionParser, parseDuration } from '../utils.js';

/** Verbosity of the cache subcommands (debug) */
const CACHE_VERBOSITY = 2;

const DEFAULT_TIMEOUT = '10s';

/**
 * Creates the cache command group
 *
 * @returns Commander command with all cache subcommands
 */
export function createCacheCommand(): Command {
  const cache = new Command('cache')
    .description('Inspect and manage the local data cache')
    .addHelpText(
      'after',
      `
Examples:
  $ epitrend cache list       Show where the cache is and when it was created
  $ epitrend cache flush      Delete the cached data
  $ epitrend cache refresh    Download fresh data into the cache
`
    );

  registerListCommand(cache);
  registerFlushCommand(cache);
  registerRefreshCommand(cache);

  return cache;
}

/**
 * Registers the 'list' subcommand
 */
function registerListCommand(parent: Command): void {
  parent
    .command('list')
    .alias('ls')
    .description('Print the cache location and creation time')
    .action(async () => {
      try {
        const { listCommand } = await import('./list.js');
        const { store } = createContext({ verbosity: CACHE_VERBOSITY, timeoutMs: 0 });
        await listCommand(store);
      } catch (error) {
        handleError(error);
      }
    });
}

/**
 * Registers the 'flush' subcommand
 */
function registerFlushCommand(parent: Command): void {
  parent
    .command('flush')
    .description('Delete the cached data')
    .action(async () => {
      try {
        const { flushCommand } = await import('./flush.js');
        const { store } = createContext({ verbosity: CACHE_VERBOSITY, timeoutMs: 0 });
        await flushCommand(store);
      } catch (error) {
        handleError(error);
      }
    });
}

/**
 * Registers the 'refresh' subcommand
 */
function registerRefreshCommand(parent: Command): void {
  parent
    .command('refresh')
    .description('Download fresh data and store it in the cache')
    .addOption(
      new Option('-t, --timeout <duration>', 'Timeout for each download')
        .argParser(optionParser(parseDuration))
        .default(parseDuration(DEFAULT_TIMEOUT), DEFAULT_TIMEOUT)
    )
    .action(async (options: { timeout: number }) => {
      try {
        const { refreshCommand } = await import('./refresh.js');
        const { service, logger } = createContext({
          verbosity: CACHE_VERBOSITY,
          timeoutMs: options.timeout,
        });
        await refreshCommand(service, logger);
      } catch (error) {
        handleError(error);
      }
    });
}
