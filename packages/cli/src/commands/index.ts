/**
 * CLI Commands Registry
 *
 * Registers the default run action, its options and the command groups
 * with the main program.
 *
 * @module packages/cli/commands
 */

import chalk from 'chalk';
import { Option } from 'commander';
import type { Command } from 'commander';
import { reportUnknownCommand } from '../suggest.js';
import { createCacheCommand } from './cache/index.js';
import { handleError, increment, optionParser, parseDays, parseDuration, shouldUseColor } from './utils.js';
import type { RunOptions } from './run.js';

const DEFAULT_STALE_AFTER = '1h';
const DEFAULT_TIMEOUT = '10s';
const DEFAULT_DAYS = 14;

/**
 * Options as commander parses them
 */
export type ProgramOptions = {
  verbose: number;
  quiet: number;
  force?: boolean;
  download?: boolean;
  cache?: boolean;
  offline?: boolean;
  staleAfter: number;
  timeout: number;
  days: number;
  json?: boolean;
  color: boolean;
  ui: boolean;
};

/**
 * Resolve parsed flags, folding aliases and the verbosity counters.
 */
export function toRunOptions(options: ProgramOptions): RunOptions {
  return {
    verbosity: options.verbose - options.quiet,
    force: options.force === true || options.download === true,
    cacheOnly: options.cache === true || options.offline === true,
    staleAfterMs: options.staleAfter,
    timeoutMs: options.timeout,
    days: options.days,
    json: options.json === true,
    ui: options.ui,
  };
}

/**
 * Registers the global options and the default action
 */
export function registerRunOptions(program: Command): void {
  program
    .addOption(
      new Option('-v, --verbose', 'Increase log output (repeatable)').argParser(increment).default(0)
    )
    .addOption(
      new Option('-q, --quiet', 'Decrease log output (repeatable)')
        .argParser(increment)
        .default(0)
        .conflicts('verbose')
    )
    .addOption(
      new Option('-f, --force', 'Ignore the cache and download new data').conflicts(['cache', 'offline'])
    )
    .addOption(new Option('--download', 'Alias for --force').hideHelp().conflicts(['cache', 'offline']))
    .addOption(new Option('-c, --cache', 'Use cached data only, never download'))
    .addOption(new Option('--offline', 'Alias for --cache').hideHelp())
    .addOption(
      new Option('-s, --stale-after <duration>', 'Age after which cached data is downloaded again')
        .argParser(optionParser(parseDuration))
        .default(parseDuration(DEFAULT_STALE_AFTER), DEFAULT_STALE_AFTER)
    )
    .addOption(
      new Option('-t, --timeout <duration>', 'Timeout for each download')
        .argParser(optionParser(parseDuration))
        .default(parseDuration(DEFAULT_TIMEOUT), DEFAULT_TIMEOUT)
    )
    .addOption(
      new Option('-d, --days <n>', 'Number of days shown in the table')
        .argParser(optionParser(parseDays))
        .default(DEFAULT_DAYS)
    )
    .option('--json', 'Output the series as JSON')
    .option('--no-color', 'Disable colored output')
    .addOption(new Option('--no-ui', 'Print the summary only').hideHelp())
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      // Disable colors if --no-color flag, NO_COLOR env, TERM=dumb, or non-TTY
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .action(async (options: ProgramOptions, command: Command) => {
      // Operands only reach the default action when they name no subcommand
      const [unknownCommand] = command.args;
      if (unknownCommand !== undefined) {
        reportUnknownCommand(program, unknownCommand);
      }

      try {
        const { runCommand } = await import('./run.js');
        await runCommand(toRunOptions(options));
      } catch (error) {
        handleError(error, options.json === true);
      }
    });
}

/**
 * Registers all command groups with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerRunOptions(program);

  // Register cache command group
  program.addCommand(createCacheCommand());
}

export { createCacheCommand };
