/**
 * Epitrend Core
 *
 * Pure reconciliation engine for case-count time series, plus the port
 * interfaces its I/O collaborators implement.
 *
 * @module @epitrend/core
 */

export * from './domain/index.js';
export * from './ports/index.js';
