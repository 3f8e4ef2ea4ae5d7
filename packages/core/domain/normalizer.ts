/**
 * Record Normalizer
 *
 * Converts partially populated upstream records into fully populated,
 * immutable NormalizedRecords. Absent numeric fields become 0; nothing
 * else is validated, so negative or implausible values pass through.
 *
 * @module packages/core/domain/normalizer
 */

import { format, isValid, parse } from 'date-fns';
import { MalformedFieldError, MissingDateError } from './errors.js';
import type { NormalizedRecord, RawDate, RawRecord, RawValue } from './records.js';

// =============================================================================
// Constants
// =============================================================================

/** Day-month-year text, used by the incremental feed */
const DMY_FORMAT = 'dd.MM.yyyy';

/** ISO calendar date, used by the bulk export and as the normalized form */
const ISO_FORMAT = 'yyyy-MM-dd';

const INTEGER_PATTERN = /^[+-]?\d+$/;

// =============================================================================
// Field Parsing
// =============================================================================

/**
 * Parse a count field. Absent or blank values resolve to 0.
 *
 * @throws MalformedFieldError if the value is not an integer
 */
export function parseCount(field: string, value: RawValue, objectId?: number): number {
  if (value === null || value === undefined) {
    return 0;
  }

  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new MalformedFieldError(field, value, { objectId });
    }
    return value;
  }

  const text = value.trim();
  if (text === '') {
    return 0;
  }
  if (!INTEGER_PATTERN.test(text)) {
    throw new MalformedFieldError(field, value, { objectId });
  }
  return Number.parseInt(text, 10);
}

/**
 * Parse a date field into an ISO calendar date.
 *
 * Returns null when the value is absent.
 *
 * @throws MalformedFieldError if a present value cannot be parsed
 */
export function parseDate(field: string, value: RawDate, objectId?: number): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '') {
      return null;
    }
    const pattern = text.includes('.') ? DMY_FORMAT : ISO_FORMAT;
    const parsed = parse(text, pattern, new Date());
    if (!isValid(parsed)) {
      throw new MalformedFieldError(field, value, { objectId });
    }
    return format(parsed, ISO_FORMAT);
  }

  // Timestamps and Date instances are instants; their calendar day is taken in UTC
  const instant = typeof value === 'number' ? new Date(value) : value;
  if (!isValid(instant)) {
    throw new MalformedFieldError(field, String(value), { objectId });
  }
  return instant.toISOString().slice(0, 10);
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize one raw record.
 *
 * @throws MissingDateError when neither date column is present
 * @throws MalformedFieldError when a present field cannot be parsed
 */
export function normalizeRecord(raw: RawRecord): NormalizedRecord {
  const id = raw.objectId;
  const date = parseDate('date', raw.date, id) ?? parseDate('dateTimestamp', raw.dateTimestamp, id);
  if (date === null) {
    throw new MissingDateError(id);
  }

  return Object.freeze({
    objectId: id,
    date,
    cases: Object.freeze({
      total: parseCount('cases.total', raw.cases?.total, id),
      increase: parseCount('cases.increase', raw.cases?.increase, id),
      reported: parseCount('cases.reported', raw.cases?.reported, id),
    }),
    deaths: Object.freeze({
      total: parseCount('deaths.total', raw.deaths?.total, id),
      increase: parseCount('deaths.increase', raw.deaths?.increase, id),
    }),
    recoveries: Object.freeze({
      total: parseCount('recoveries.total', raw.recoveries?.total, id),
      increase: parseCount('recoveries.increase', raw.recoveries?.increase, id),
    }),
    hospitalisations: Object.freeze({
      total: parseCount('hospitalisations.total', raw.hospitalisations?.total, id),
      increase: parseCount('hospitalisations.increase', raw.hospitalisations?.increase, id),
      bedsInUse: parseCount('hospitalisations.bedsInUse', raw.hospitalisations?.bedsInUse, id),
    }),
  });
}

/**
 * Options for batch normalization
 */
export interface NormalizeRecordsOptions {
  /** What to do with records that carry no date (default: drop) */
  onMissingDate?: 'drop' | 'throw';
  /** Called for every dropped record */
  onDropped?: (error: MissingDateError) => void;
}

/**
 * Normalize a batch of raw records, preserving their order.
 *
 * Dateless records are dropped unless `onMissingDate` is `throw`.
 * A malformed field always aborts the batch.
 */
export function normalizeRecords(
  raws: readonly RawRecord[],
  options: NormalizeRecordsOptions = {}
): NormalizedRecord[] {
  const mode = options.onMissingDate ?? 'drop';
  const records: NormalizedRecord[] = [];

  for (const raw of raws) {
    try {
      records.push(normalizeRecord(raw));
    } catch (error) {
      if (error instanceof MissingDateError && mode === 'drop') {
        options.onDropped?.(error);
        continue;
      }
      throw error;
    }
  }

  return records;
}
