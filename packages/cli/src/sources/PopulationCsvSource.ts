/**
 * Population Source
 *
 * Population by district; the denominator is the sum of the last column.
 *
 * @module packages/cli/sources/PopulationCsvSource
 */

import { parseCount } from '@epitrend/core';
import type { IPopulationSource } from '@epitrend/core';
import type { HttpClient } from './http.js';
import type { Logger } from '../logger.js';
import { parseSemicolonCsv } from './csv.js';

/**
 * Sum the last cell of every data row.
 *
 * @throws MalformedFieldError when a cell is not an integer
 */
export function sumPopulation(rows: readonly (readonly string[])[]): number {
  return rows.reduce((total, row, index) => total + parseCount('population', row.at(-1), index + 1), 0);
}

export class PopulationCsvSource implements IPopulationSource {
  private readonly url: string;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(url: string, http: HttpClient, logger: Logger) {
    this.url = url;
    this.http = http;
    this.logger = logger.child({ component: 'population-source' });
  }

  async fetch(): Promise<number> {
    this.logger.debug('Reading population info');

    const body = await this.http.getText(this.url);
    const population = sumPopulation(parseSemicolonCsv(body, 'population'));

    this.logger.info({ population }, 'Population read');
    return population;
  }
}
