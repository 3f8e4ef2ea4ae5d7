/**
 * Source Ports
 *
 * Boundaries between the engine and the collaborators that retrieve raw
 * payloads. Adapters live in the CLI package.
 *
 * @module packages/core/ports/sources
 */

import type { RawRecord } from '../domain/records.js';

/**
 * Options for fetching records
 */
export interface RecordFetchOptions {
  /** Skip this many records from the start of the source */
  offset?: number;
}

/**
 * A source of raw case-count records, oldest first.
 */
export interface IRecordSource {
  /** Short name for logs */
  readonly name: string;
  fetch(options?: RecordFetchOptions): Promise<RawRecord[]>;
}

/**
 * A source of the population denominator.
 */
export interface IPopulationSource {
  fetch(): Promise<number>;
}
