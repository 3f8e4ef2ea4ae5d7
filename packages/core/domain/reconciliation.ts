/**
 * Reconciliation Engine
 *
 * Walks normalized records in date order, carrying running totals and a
 * 7-day window of reported cases, and emits finalized data points whose
 * total/increase pairs agree with the running state.
 *
 * A record's authoritative value per metric is its total when that is
 * nonzero (total-driven), otherwise its increase (delta-driven). This lets
 * a source that only reports cumulative totals be merged with one that
 * only reports day-over-day deltas.
 *
 * @module packages/core/domain/reconciliation
 */

import { InvalidPopulationError } from './errors.js';
import type { Counter, FinalizedDataPoint, Metric, NormalizedRecord } from './records.js';

// =============================================================================
// Constants
// =============================================================================

/** Number of days in the incidence window */
export const WINDOW_SIZE = 7;

/** Incidence is reported per this many inhabitants */
export const INCIDENCE_BASE = 100_000;

// =============================================================================
// Types
// =============================================================================

/**
 * How to derive an increase from a total that went down.
 *
 * - saturating: clamp at zero (default; a negative daily increase is not
 *   meaningful to a reader of the chart)
 * - signed: keep the negative difference, exposing upstream corrections
 */
export type IncreasePolicy = 'saturating' | 'signed';

/**
 * Running totals per metric group
 */
export type RunningTotals = Record<Metric, number>;

/**
 * Accumulated state carried across one reconciliation pass.
 */
export interface ReconciliationState {
  totals: RunningTotals;
  /** Reported cases of the last 7 records, oldest first */
  window: number[];
}

/**
 * Description of previously accumulated state, used to continue a pass
 * over records that extend an already reconciled sequence.
 */
export interface ResumeState {
  readonly totals: Readonly<RunningTotals>;
  /** Up to 7 reported-case values, oldest first; shorter windows are zero-padded on the left */
  readonly window: readonly number[];
}

export interface ReconcileOptions {
  /** Initial state; defaults to all zeros */
  seed?: ResumeState;
  /** Default: saturating */
  increasePolicy?: IncreasePolicy;
}

// =============================================================================
// State
// =============================================================================

/**
 * Create the accumulator for a pass, either fresh or from a seed.
 */
export function createReconciliationState(seed?: ResumeState): ReconciliationState {
  const window = new Array<number>(WINDOW_SIZE).fill(0);
  if (seed) {
    const tail = seed.window.slice(-WINDOW_SIZE);
    window.splice(WINDOW_SIZE - tail.length, tail.length, ...tail);
  }

  return {
    totals: {
      cases: seed?.totals.cases ?? 0,
      deaths: seed?.totals.deaths ?? 0,
      recoveries: seed?.totals.recoveries ?? 0,
      hospitalisations: seed?.totals.hospitalisations ?? 0,
    },
    window,
  };
}

/**
 * Derive the resume state from the tail of a finalized sequence.
 *
 * Totals come from the last point, the window from the last 7 reported
 * values. An empty sequence yields the fresh state.
 */
export function resumeStateFrom(points: readonly FinalizedDataPoint[]): ResumeState {
  const last = points.at(-1);
  const window = points.slice(-WINDOW_SIZE).map((point) => point.cases.reported);

  return {
    totals: {
      cases: last?.cases.total ?? 0,
      deaths: last?.deaths.total ?? 0,
      recoveries: last?.recoveries.total ?? 0,
      hospitalisations: last?.hospitalisations.total ?? 0,
    },
    window: [...new Array<number>(WINDOW_SIZE - window.length).fill(0), ...window],
  };
}

/**
 * Validate the population denominator.
 *
 * @throws InvalidPopulationError unless population is finite and positive
 */
export function assertValidPopulation(population: number): void {
  if (!Number.isFinite(population) || population <= 0) {
    throw new InvalidPopulationError(population);
  }
}

/**
 * Incidence for a window sum, per 100,000 inhabitants.
 */
export function incidenceOf(window: readonly number[], population: number): number {
  const sum = window.reduce((acc, value) => acc + value, 0);
  return (sum * INCIDENCE_BASE) / population;
}

// =============================================================================
// Per-Record Step
// =============================================================================

function reconcileCounter(
  counter: Counter,
  running: number,
  policy: IncreasePolicy
): Counter {
  if (counter.total !== 0) {
    const difference = counter.total - running;
    return {
      total: counter.total,
      increase: policy === 'saturating' ? Math.max(0, difference) : difference,
    };
  }

  return {
    total: running + counter.increase,
    increase: counter.increase,
  };
}

/**
 * Reconcile a single record against the state, mutating the state.
 *
 * Incidence is taken from the window before this record's own report is
 * admitted, so it always describes the preceding 7 days.
 */
export function reconcileRecord(
  state: ReconciliationState,
  record: NormalizedRecord,
  population: number,
  policy: IncreasePolicy = 'saturating'
): FinalizedDataPoint {
  const incidence = incidenceOf(state.window, population);

  state.window.shift();
  state.window.push(record.cases.reported);

  const advance = (metric: Metric): Counter => {
    const result = reconcileCounter(record[metric], state.totals[metric], policy);
    state.totals[metric] = result.total;
    return result;
  };

  return Object.freeze({
    objectId: record.objectId,
    date: record.date,
    incidence,
    cases: Object.freeze({ ...advance('cases'), reported: record.cases.reported }),
    deaths: Object.freeze(advance('deaths')),
    recoveries: Object.freeze(advance('recoveries')),
    hospitalisations: Object.freeze({
      ...advance('hospitalisations'),
      bedsInUse: record.hospitalisations.bedsInUse,
    }),
  });
}

// =============================================================================
// Full Pass
// =============================================================================

/**
 * Reconcile an ordered sequence of records.
 *
 * The caller guarantees ascending dates and has already removed overlapping
 * dates between sources. Output `i` depends only on input `i` and outputs
 * `0..i-1`.
 *
 * @param records - Records in ascending date order
 * @param population - Positive population count for the incidence
 * @throws InvalidPopulationError if population is not positive
 */
export function reconcile(
  records: readonly NormalizedRecord[],
  population: number,
  options: ReconcileOptions = {}
): FinalizedDataPoint[] {
  assertValidPopulation(population);

  const policy = options.increasePolicy ?? 'saturating';
  const state = createReconciliationState(options.seed);

  return records.map((record) => reconcileRecord(state, record, population, policy));
}
