/**
 * Run Command
 *
 * The default action: obtain the current series (cached or downloaded)
 * and print a summary of the latest day followed by a table of the last
 * days, or the whole series as JSON.
 *
 * @module packages/cli/commands/run
 */

import ora from 'ora';
import { createMessageBundle } from '../messages/index.js';
import { renderJson, renderSummary, renderTable } from '../render/formatters.js';
import { createContext, handleError, isInteractive } from './utils.js';
import type { CommandContext } from './utils.js';

export interface RunOptions {
  /** Net verbosity: `-v` count minus `-q` count */
  verbosity: number;
  force: boolean;
  cacheOnly: boolean;
  staleAfterMs: number;
  timeoutMs: number;
  days: number;
  json: boolean;
  /** Print the table below the summary */
  ui: boolean;
}

/**
 * Executes the default command
 *
 * @param options - Resolved command options
 * @param context - Collaborators; built from configuration when omitted
 */
export async function runCommand(options: RunOptions, context?: CommandContext): Promise<void> {
  const spinner =
    isInteractive() && !options.json && !options.cacheOnly && options.verbosity >= 0
      ? ora('Loading case data...').start()
      : null;

  try {
    const { config, service } =
      context ?? createContext({ verbosity: options.verbosity, timeoutMs: options.timeoutMs });

    const result = await service.current({
      force: options.force,
      cacheOnly: options.cacheOnly,
      staleAfterMs: options.staleAfterMs,
    });
    spinner?.stop();

    if (options.json) {
      console.log(renderJson(result));
      return;
    }

    const messages = createMessageBundle(config.locale);
    console.log(renderSummary(result.points, messages));

    if (options.ui && result.points.length > 0) {
      console.log();
      console.log(renderTable(result.points, { days: options.days }));
    }
  } catch (error) {
    spinner?.fail('Failed to load case data');
    handleError(error, options.json);
  }
}
