/**
 * Typo Detection
 *
 * Did-you-mean suggestions for unknown commands.
 *
 * @module packages/cli/suggest
 */

import chalk from 'chalk';
import type { Command } from 'commander';

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];
  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }
  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1
        );
      }
    }
  }
  return matrix[b.length][a.length];
}

/**
 * Find closest matching command names, nearest first
 */
export function findSimilarCommands(input: string, commands: string[], maxDistance = 2): string[] {
  return commands
    .map((cmd) => ({ cmd, distance: levenshtein(input.toLowerCase(), cmd.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map(({ cmd }) => cmd);
}

/**
 * Print an unknown-command error with suggestions and exit
 */
export function reportUnknownCommand(program: Command, unknownCommand: string): never {
  const available = program.commands.map((cmd) => cmd.name());
  const suggestions = findSimilarCommands(unknownCommand, available);

  console.error(chalk.red(`error: unknown command '${unknownCommand}'`));

  if (suggestions.length > 0) {
    console.error();
    console.error(chalk.yellow('Did you mean one of these?'));
    suggestions.forEach((cmd) => {
      console.error(`  ${chalk.cyan(cmd)}`);
    });
  }

  console.error();
  console.error(`Run ${chalk.cyan(`${program.name()} --help`)} for a list of available commands.`);
  process.exit(1);
}
