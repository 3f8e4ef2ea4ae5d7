#!/usr/bin/env node
/**
 * epitrend CLI
 *
 * Entry point for the `epitrend` command: downloads, reconciles, caches
 * and displays case-count time series.
 *
 * @module packages/cli/bin/epitrend
 */

import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';
import { VERSION } from '../config.js';

const program = new Command();

program
  .name('epitrend')
  .description('Download, reconcile and display case-count time series')
  .version(VERSION);

// Register the default action and all command groups
registerCommands(program);

// Parse arguments
await program.parseAsync();
