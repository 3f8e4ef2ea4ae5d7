/**
 * Historical Source
 *
 * The open-data CSV export: one row per day, dates as `yyyy-MM-dd`,
 * semicolon-delimited. Carries cumulative totals for every metric but
 * no bed occupancy.
 *
 * @module packages/cli/sources/HistoricalCsvSource
 */

import { MalformedFieldError } from '@epitrend/core';
import type { IRecordSource, RawRecord } from '@epitrend/core';
import type { HttpClient } from './http.js';
import type { Logger } from '../logger.js';
import { parseSemicolonCsv } from './csv.js';

// =============================================================================
// Column Layout
// =============================================================================

/** Zero-based column positions */
export const HistoricalColumns = {
  date: 0,
  casesReported: 4,
  casesTotal: 5,
  hospitalisationsIncrease: 6,
  hospitalisationsTotal: 7,
  deathsIncrease: 8,
  deathsTotal: 9,
  recoveriesIncrease: 10,
  recoveriesTotal: 11,
} as const;

const MIN_COLUMNS = HistoricalColumns.recoveriesTotal + 1;

/**
 * Map one CSV row to a raw record. Empty cells become absent values.
 *
 * @param row - Cells of the row
 * @param index - Zero-based data row index
 * @throws MalformedFieldError when the row is too short
 */
export function historicalRowToRecord(row: readonly string[], index: number): RawRecord {
  const objectId = index + 1;
  if (row.length < MIN_COLUMNS) {
    throw new MalformedFieldError('row', row.join(';'), { objectId });
  }

  const cell = (column: number): string | undefined => {
    const value = row[column];
    return value === '' ? undefined : value;
  };

  return {
    objectId,
    date: cell(HistoricalColumns.date),
    cases: {
      total: cell(HistoricalColumns.casesTotal),
      reported: cell(HistoricalColumns.casesReported),
    },
    deaths: {
      total: cell(HistoricalColumns.deathsTotal),
      increase: cell(HistoricalColumns.deathsIncrease),
    },
    recoveries: {
      total: cell(HistoricalColumns.recoveriesTotal),
      increase: cell(HistoricalColumns.recoveriesIncrease),
    },
    hospitalisations: {
      total: cell(HistoricalColumns.hospitalisationsTotal),
      increase: cell(HistoricalColumns.hospitalisationsIncrease),
    },
  };
}

// =============================================================================
// Source
// =============================================================================

export class HistoricalCsvSource implements IRecordSource {
  readonly name = 'historical';

  private readonly url: string;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(url: string, http: HttpClient, logger: Logger) {
    this.url = url;
    this.http = http;
    this.logger = logger.child({ component: 'historical-source' });
  }

  async fetch(): Promise<RawRecord[]> {
    this.logger.debug('Reading CSV from data portal');

    const body = await this.http.getText(this.url);
    const records = parseSemicolonCsv(body, 'historical').map(historicalRowToRecord);

    this.logger.info({ count: records.length }, 'Historical records read');
    return records;
  }
}
