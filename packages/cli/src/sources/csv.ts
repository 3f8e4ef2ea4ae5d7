/**
 * Semicolon CSV parsing shared by the CSV sources.
 *
 * @module packages/cli/sources/csv
 */

import { parse } from 'csv-parse/sync';
import { MalformedFieldError } from '@epitrend/core';

/**
 * Parse a semicolon-delimited CSV body into data rows, skipping the header.
 *
 * @throws MalformedFieldError when the body is not valid CSV
 */
export function parseSemicolonCsv(body: string, source: string): string[][] {
  let rows: unknown;
  try {
    rows = parse(body, {
      delimiter: ';',
      from_line: 2,
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
      trim: true,
    });
  } catch (error) {
    throw new MalformedFieldError(source, body.slice(0, 80), { cause: error });
  }

  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.filter(isStringRow);
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}
