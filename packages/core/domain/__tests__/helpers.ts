/**
 * Test helpers for building normalized records.
 */

import type { NormalizedRecord } from '../records.js';

export interface RecordSpec {
  date: string;
  objectId?: number;
  cases?: { total?: number; increase?: number; reported?: number };
  deaths?: { total?: number; increase?: number };
  recoveries?: { total?: number; increase?: number };
  hospitalisations?: { total?: number; increase?: number; bedsInUse?: number };
}

let nextId = 1;

export function makeRecord(spec: RecordSpec): NormalizedRecord {
  return {
    objectId: spec.objectId ?? nextId++,
    date: spec.date,
    cases: {
      total: spec.cases?.total ?? 0,
      increase: spec.cases?.increase ?? 0,
      reported: spec.cases?.reported ?? 0,
    },
    deaths: { total: spec.deaths?.total ?? 0, increase: spec.deaths?.increase ?? 0 },
    recoveries: { total: spec.recoveries?.total ?? 0, increase: spec.recoveries?.increase ?? 0 },
    hospitalisations: {
      total: spec.hospitalisations?.total ?? 0,
      increase: spec.hospitalisations?.increase ?? 0,
      bedsInUse: spec.hospitalisations?.bedsInUse ?? 0,
    },
  };
}

/**
 * ISO date for day `n` of March 2021 (n starts at 1)
 */
export function day(n: number): string {
  return `2021-03-${String(n).padStart(2, '0')}`;
}
