/**
 * Source Merging
 *
 * The engine requires one ascending sequence without duplicate dates.
 * These helpers build it from a historical export followed by an
 * incremental feed whose first records may overlap the export's tail.
 *
 * @module packages/core/domain/merge
 */

import type { NormalizedRecord } from './records.js';

/**
 * Whether the records are in strictly ascending date order.
 */
export function isChronological(records: readonly NormalizedRecord[]): boolean {
  for (let i = 1; i < records.length; i++) {
    if (records[i].date <= records[i - 1].date) {
      return false;
    }
  }
  return true;
}

/**
 * Records of `incremental` dated strictly after the last historical record.
 */
export function newerThan(
  historical: readonly NormalizedRecord[],
  incremental: readonly NormalizedRecord[]
): NormalizedRecord[] {
  const last = historical.at(-1);
  if (!last) {
    return [...incremental];
  }
  return incremental.filter((record) => record.date > last.date);
}

/**
 * Concatenate historical-then-incremental records, dropping incremental
 * records that do not extend the historical sequence.
 */
export function mergeSources(
  historical: readonly NormalizedRecord[],
  incremental: readonly NormalizedRecord[]
): NormalizedRecord[] {
  return [...historical, ...newerThan(historical, incremental)];
}
