/**
 * Cache Store Port
 *
 * The cache is an optimization, not a source of truth: implementations
 * report contention and unreadable files as "no cache" rather than failing.
 * Staleness is decided by the caller from `createdAt`.
 *
 * @module packages/core/ports/cache-store
 */

import type { FinalizedDataPoint } from '../domain/records.js';

/**
 * A finalized series together with the time it was stored
 */
export interface CachedSeries {
  createdAt: Date;
  points: FinalizedDataPoint[];
}

export interface ICacheStore {
  /** Where the cache lives (for display) */
  readonly location: string;

  /**
   * Load the cached series.
   *
   * @returns null when there is no usable cache
   */
  load(): Promise<CachedSeries | null>;

  /**
   * Replace the cached series, stamping it with the current time.
   */
  store(points: readonly FinalizedDataPoint[]): Promise<void>;

  /**
   * Delete the cache. Succeeds when there is nothing to delete.
   */
  remove(): Promise<void>;
}
