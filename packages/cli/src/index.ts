/**
 * epitrend CLI
 *
 * Adapters (HTTP sources, file cache, messages, rendering) around the
 * reconciliation engine, plus the commander program that drives them.
 *
 * @module @epitrend/cli
 */

// =============================================================================
// Command Exports
// =============================================================================

export { registerCommands, registerRunOptions, toRunOptions, createCacheCommand } from './commands/index.js';
export type { ProgramOptions } from './commands/index.js';
export { runCommand } from './commands/run.js';
export type { RunOptions } from './commands/run.js';

// =============================================================================
// Service Exports
// =============================================================================

export { downloadSeries } from './services/pipeline.js';
export type { PipelineSources, PipelineOptions } from './services/pipeline.js';
export { DataService, isStale } from './services/dataService.js';
export type { DataRequest, SeriesResult, DataServiceOptions } from './services/dataService.js';

// =============================================================================
// Adapter Exports
// =============================================================================

export * from './sources/index.js';
export * from './cache/index.js';
export { MessageBundle, createMessageBundle, resolveLocale } from './messages/index.js';
export type { Locale } from './messages/index.js';
export { renderSummary, renderTable, renderJson, summaryLines, tableRows } from './render/formatters.js';

// =============================================================================
// Utility Exports
// =============================================================================

export { loadConfig, getConfig, resetConfig } from './config.js';
export type { Config } from './config.js';
export { createLogger, createSilentLogger, verbosityToLevel } from './logger.js';
export type { Logger } from './logger.js';
export { createContext, handleError, parseDuration, parseDays } from './commands/utils.js';
