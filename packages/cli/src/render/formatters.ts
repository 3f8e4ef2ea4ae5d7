/**
 * Output Formatters
 *
 * Read-only views of a finalized series: a localized summary of the latest
 * day, a table of the last days, and JSON.
 *
 * @module packages/cli/render/formatters
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { activeCases, dailyChange } from '@epitrend/core';
import type { FinalizedDataPoint, IMessageBundle } from '@epitrend/core';
import type { SeriesResult } from '../services/dataService.js';

// ============================================================================
// Summary
// ============================================================================

/**
 * Summary lines for the latest point, with day-over-day changes.
 */
export function summaryLines(
  points: readonly FinalizedDataPoint[],
  messages: IMessageBundle
): string[] {
  const current = points.at(-1);
  if (!current) {
    return [];
  }
  const change = dailyChange(current, points.at(-2));

  return [
    messages.format('cases', current.cases.total, change.increases.cases),
    messages.format('active', activeCases(current), change.active),
    messages.format('recovered', current.recoveries.total, change.increases.recoveries),
    messages.format('hospitalised', current.hospitalisations.total, change.increases.hospitalisations),
    messages.format('deaths', current.deaths.total, change.increases.deaths),
    messages.format('incidence', current.incidence, change.incidence),
  ];
}

/**
 * Summary block: the date of the latest point followed by its summary lines.
 */
export function renderSummary(
  points: readonly FinalizedDataPoint[],
  messages: IMessageBundle
): string {
  const current = points.at(-1);
  if (!current) {
    return chalk.yellow('No data available.');
  }

  const lines = summaryLines(points, messages);
  return [chalk.bold(current.date), ...lines.map((line) => `  ${line}`)].join('\n');
}

// ============================================================================
// Table
// ============================================================================

export const TABLE_HEADERS = [
  'Date',
  'Cases',
  'New',
  'Reported',
  'Active',
  'Recovered',
  'Hospitalised',
  'Beds',
  'Deaths',
  'Incidence',
] as const;

export interface TableOptions {
  /** Number of most recent days to include */
  days: number;
}

/**
 * Table cells for the most recent `days` points, oldest first.
 */
export function tableRows(points: readonly FinalizedDataPoint[], options: TableOptions): string[][] {
  const recent = options.days > 0 ? points.slice(-options.days) : [];
  return recent.map((point) => [
    point.date,
    String(point.cases.total),
    String(point.cases.increase),
    String(point.cases.reported),
    String(activeCases(point)),
    String(point.recoveries.total),
    String(point.hospitalisations.total),
    String(point.hospitalisations.bedsInUse),
    String(point.deaths.total),
    point.incidence.toFixed(1),
  ]);
}

/**
 * Render the most recent days as a table.
 */
export function renderTable(points: readonly FinalizedDataPoint[], options: TableOptions): string {
  const table = new Table({
    head: TABLE_HEADERS.map((header) => chalk.bold(header)),
    colAligns: ['left', ...TABLE_HEADERS.slice(1).map(() => 'right' as const)],
    style: {
      head: [],
      border: [],
    },
  });

  for (const row of tableRows(points, options)) {
    table.push([chalk.cyan(row[0]), ...row.slice(1)]);
  }

  return table.toString();
}

// ============================================================================
// JSON
// ============================================================================

/**
 * JSON document for `--json` output
 */
export function renderJson(result: SeriesResult): string {
  return JSON.stringify(
    {
      createdAt: result.createdAt.toISOString(),
      origin: result.origin,
      points: result.points,
    },
    null,
    2
  );
}
