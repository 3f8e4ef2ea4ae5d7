/**
 * Derived Metrics
 *
 * Values computed per finalized point without any running state.
 *
 * @module packages/core/domain/metrics
 */

import type { FinalizedDataPoint, Metric } from './records.js';

/**
 * Cases that are neither recovered nor fatal.
 *
 * Not clamped: inconsistent upstream totals may make this negative.
 */
export function activeCases(point: FinalizedDataPoint): number {
  return point.cases.total - point.deaths.total - point.recoveries.total;
}

/**
 * Day-over-day change of a point relative to its predecessor.
 */
export interface DailyChange {
  increases: Record<Metric, number>;
  active: number;
  incidence: number;
}

/**
 * Compute the change shown next to each total in the summary.
 *
 * Metric increases are the reconciled increases of `current`; active cases
 * and incidence are differences against `previous` (or against zero when
 * there is no predecessor).
 */
export function dailyChange(
  current: FinalizedDataPoint,
  previous: FinalizedDataPoint | undefined
): DailyChange {
  return {
    increases: {
      cases: current.cases.increase,
      deaths: current.deaths.increase,
      recoveries: current.recoveries.increase,
      hospitalisations: current.hospitalisations.increase,
    },
    active: activeCases(current) - (previous ? activeCases(previous) : 0),
    incidence: current.incidence - (previous?.incidence ?? 0),
  };
}
