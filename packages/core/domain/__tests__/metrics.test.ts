/**
 * Derived Metrics Tests
 */

import { describe, it, expect } from 'vitest';
import { activeCases, dailyChange } from '../metrics.js';
import { reconcile } from '../reconciliation.js';
import { day, makeRecord } from './helpers.js';

describe('activeCases', () => {
  it('subtracts deaths and recoveries from total cases', () => {
    const [point] = reconcile(
      [
        makeRecord({
          date: day(1),
          cases: { total: 100 },
          deaths: { total: 5 },
          recoveries: { total: 60 },
        }),
      ],
      100_000
    );

    expect(activeCases(point)).toBe(35);
  });

  it('is not clamped when upstream totals disagree', () => {
    const [point] = reconcile(
      [makeRecord({ date: day(1), cases: { total: 10 }, recoveries: { total: 12 } })],
      100_000
    );

    expect(activeCases(point)).toBe(-2);
  });
});

describe('dailyChange', () => {
  const points = reconcile(
    [
      makeRecord({
        date: day(1),
        cases: { total: 100, reported: 20 },
        deaths: { total: 2 },
        recoveries: { total: 50 },
        hospitalisations: { total: 7 },
      }),
      makeRecord({
        date: day(2),
        cases: { total: 130, reported: 30 },
        deaths: { increase: 1 },
        recoveries: { total: 60 },
        hospitalisations: { increase: 2 },
      }),
    ],
    100_000
  );

  it('measures the first point against zero', () => {
    expect(dailyChange(points[0], undefined)).toEqual({
      increases: { cases: 100, deaths: 2, recoveries: 50, hospitalisations: 7 },
      active: 48,
      incidence: 0,
    });
  });

  it('measures later points against their predecessor', () => {
    // active: 48 -> 130 - 3 - 60 = 67; incidence: 0 -> 20
    expect(dailyChange(points[1], points[0])).toEqual({
      increases: { cases: 30, deaths: 1, recoveries: 10, hospitalisations: 2 },
      active: 19,
      incidence: 20,
    });
  });
});
