import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { reconcile } from '@epitrend/core';
import type { NormalizedRecord } from '@epitrend/core';
import { MessageBundle } from '../../messages/index.js';
import {
  TABLE_HEADERS,
  renderJson,
  renderSummary,
  renderTable,
  summaryLines,
  tableRows,
} from '../formatters.js';

function record(day: number, cases: number, reported: number, deaths: number, recoveries: number): NormalizedRecord {
  return {
    objectId: day,
    date: `2021-03-${String(day).padStart(2, '0')}`,
    cases: { total: cases, increase: 0, reported },
    deaths: { total: deaths, increase: 0 },
    recoveries: { total: recoveries, increase: 0 },
    hospitalisations: { total: 10 + day, increase: 0, bedsInUse: day },
  };
}

// Population 100 000: incidence equals the sum of the preceding reports
const POINTS = reconcile(
  [record(1, 1000, 40, 10, 700), record(2, 1050, 50, 11, 720), record(3, 1080, 30, 13, 760)],
  100_000
);

describe('formatters', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('summaryLines', () => {
    it('should describe the latest day with its changes', () => {
      expect(summaryLines(POINTS, new MessageBundle('en'))).toEqual([
        '  1080 (  +30) total cases',
        '   307 (  -12) active cases',
        '   760 (  +40) recovered',
        '    13 (   +1) hospitalised',
        '    13 (   +2) deaths',
        '  90.0 (+50.0) incidence',
      ]);
    });

    it('should measure a single point against zero', () => {
      expect(summaryLines(POINTS.slice(0, 1), new MessageBundle('en'))[1]).toBe(
        '   290 ( +290) active cases'
      );
    });

    it('should be empty without data', () => {
      expect(summaryLines([], new MessageBundle('en'))).toEqual([]);
    });
  });

  describe('renderSummary', () => {
    it('should head the summary with the date', () => {
      const lines = renderSummary(POINTS, new MessageBundle('de')).split('\n');

      expect(lines[0]).toBe('2021-03-03');
      expect(lines[1]).toBe('    1080 (  +30) Fälle');
      expect(lines).toHaveLength(7);
    });

    it('should say when there is no data', () => {
      expect(renderSummary([], new MessageBundle('en'))).toBe('No data available.');
    });
  });

  describe('tableRows', () => {
    it('should list the most recent days, oldest first', () => {
      expect(tableRows(POINTS, { days: 2 })).toEqual([
        ['2021-03-02', '1050', '50', '50', '319', '720', '12', '2', '11', '40.0'],
        ['2021-03-03', '1080', '30', '30', '307', '760', '13', '3', '13', '90.0'],
      ]);
    });

    it('should list everything when asked for more days than exist', () => {
      expect(tableRows(POINTS, { days: 14 })).toHaveLength(3);
    });
  });

  describe('renderTable', () => {
    it('should render headers and one line per day', () => {
      const output = renderTable(POINTS, { days: 2 });

      for (const header of TABLE_HEADERS) {
        expect(output).toContain(header);
      }
      expect(output).toContain('2021-03-02');
      expect(output).toContain('2021-03-03');
      expect(output).not.toContain('2021-03-01');
    });
  });

  describe('renderJson', () => {
    it('should include the series and its provenance', () => {
      const parsed: unknown = JSON.parse(
        renderJson({ points: POINTS, origin: 'cache', createdAt: new Date('2021-03-03T06:00:00.000Z') })
      );

      expect(parsed).toEqual({ createdAt: '2021-03-03T06:00:00.000Z', origin: 'cache', points: POINTS });
    });
  });
});
