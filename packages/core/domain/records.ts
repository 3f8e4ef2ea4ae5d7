/**
 * Case-Count Record Types
 *
 * Defines the three stages a record passes through:
 * - RawRecord: as delivered by an upstream source, any field may be absent
 * - NormalizedRecord: every numeric field resolved, date required
 * - FinalizedDataPoint: reconciled totals/increases plus computed incidence
 *
 * @module packages/core/domain/records
 */

// =============================================================================
// Raw Records
// =============================================================================

/**
 * A numeric field as it arrives from upstream: a number (JSON feeds),
 * a text cell (CSV exports), or nothing at all.
 */
export type RawValue = number | string | null | undefined;

/**
 * A date as it arrives from upstream.
 *
 * Strings are `dd.MM.yyyy` or `yyyy-MM-dd`, numbers are epoch milliseconds.
 */
export type RawDate = string | number | Date | null | undefined;

export interface RawCases {
  total?: RawValue;
  increase?: RawValue;
  /** Cases reported for this specific day */
  reported?: RawValue;
}

export interface RawCounter {
  total?: RawValue;
  increase?: RawValue;
}

export interface RawHospitalisations extends RawCounter {
  bedsInUse?: RawValue;
}

/**
 * One record from an upstream source.
 */
export interface RawRecord {
  /** Sequence index within the source */
  objectId: number;
  /** Primary date column */
  date?: RawDate;
  /** Secondary date column (epoch ms), used when `date` is absent */
  dateTimestamp?: RawDate;
  cases?: RawCases;
  deaths?: RawCounter;
  recoveries?: RawCounter;
  hospitalisations?: RawHospitalisations;
}

// =============================================================================
// Normalized Records
// =============================================================================

export interface Counter {
  readonly total: number;
  readonly increase: number;
}

export interface Cases extends Counter {
  readonly reported: number;
}

export interface Hospitalisations extends Counter {
  readonly bedsInUse: number;
}

/**
 * A fully populated record. Deeply frozen once constructed.
 */
export interface NormalizedRecord {
  readonly objectId: number;
  /** ISO calendar date, `yyyy-MM-dd` */
  readonly date: string;
  readonly cases: Cases;
  readonly deaths: Counter;
  readonly recoveries: Counter;
  readonly hospitalisations: Hospitalisations;
}

/**
 * The metric groups that carry a total/increase pair.
 */
export const METRICS = ['cases', 'deaths', 'recoveries', 'hospitalisations'] as const;

export type Metric = (typeof METRICS)[number];

// =============================================================================
// Finalized Data Points
// =============================================================================

/**
 * A reconciled record: every total/increase pair is consistent with the
 * running state, and incidence is computed from the trailing window.
 */
export interface FinalizedDataPoint extends NormalizedRecord {
  /** New cases per 100,000 population over the trailing 7 days */
  readonly incidence: number;
}
