/**
 * Core Domain
 *
 * Record model, normalization, reconciliation and derived metrics.
 */

export * from './errors.js';
export * from './records.js';
export * from './normalizer.js';
export * from './reconciliation.js';
export * from './metrics.js';
export * from './merge.js';
