import { describe, it, expect } from 'vitest';
import { MalformedFieldError, InvalidPopulationError } from '@epitrend/core';
import type { RawRecord } from '@epitrend/core';
import { downloadSeries } from '../pipeline.js';
import { createSilentLogger } from '../../logger.js';
import { FakePopulationSource, FakeRecordSource } from './fakes.js';

const logger = createSilentLogger();

const HISTORICAL: RawRecord[] = [
  { objectId: 1, date: '2021-03-01', cases: { total: '10', reported: '10' }, deaths: { total: '1' } },
  { objectId: 2, date: '2021-03-02', cases: { total: '30', reported: '20' }, deaths: { increase: '1' } },
  { objectId: 3, cases: { total: '31', reported: '1' } },
  { objectId: 4, date: '2021-03-03', cases: { total: '60', reported: '30' }, deaths: { total: '2' } },
];

// Object ids mirror the export rows, so the offset skips the overlapping days
const FEED: RawRecord[] = [
  { objectId: 1, date: '01.03.2021', cases: { total: 10 } },
  { objectId: 2, date: '02.03.2021', cases: { total: 30 } },
  { objectId: 3, date: '02.03.2021', cases: { total: 30 } },
  { objectId: 4, date: '03.03.2021', cases: { total: 60 } },
  { objectId: 5, date: '04.03.2021', cases: { increase: 15, reported: 40 }, deaths: { increase: 1 } },
  { objectId: 6, date: '05.03.2021', cases: { total: 70, reported: 5 } },
];

function sources(population = 100_000) {
  return {
    historical: new FakeRecordSource('historical', HISTORICAL),
    feed: new FakeRecordSource('feed', FEED),
    population: new FakePopulationSource(population),
  };
}

describe('downloadSeries', () => {
  it('should reconcile the export followed by newer feed records', async () => {
    const points = await downloadSeries(sources(), { logger });

    expect(points.map((p) => p.date)).toEqual([
      '2021-03-01',
      '2021-03-02',
      '2021-03-03',
      '2021-03-04',
      '2021-03-05',
    ]);
    expect(points.map((p) => p.cases.total)).toEqual([10, 30, 60, 75, 70]);
    expect(points.map((p) => p.cases.increase)).toEqual([10, 20, 30, 15, 0]);
    expect(points.map((p) => p.deaths.total)).toEqual([1, 2, 2, 3, 3]);
  });

  it('should carry the incidence window across the source boundary', async () => {
    const points = await downloadSeries(sources(), { logger });

    // reported: 10, 20, 30 from the export, then 40 from the feed
    expect(points.map((p) => p.incidence)).toEqual([0, 10, 30, 60, 100]);
  });

  it('should request the feed from the number of export rows', async () => {
    const fakes = sources();

    await downloadSeries(fakes, { logger });

    expect(fakes.feed.fetch).toHaveBeenCalledWith({ offset: 4 });
  });

  it('should keep signed increases when asked to', async () => {
    const points = await downloadSeries(sources(), { logger, increasePolicy: 'signed' });

    expect(points.at(-1)?.cases.increase).toBe(-5);
  });

  it('should reject an invalid population', async () => {
    await expect(downloadSeries(sources(0), { logger })).rejects.toThrow(InvalidPopulationError);
  });

  it('should abort on a malformed field', async () => {
    const fakes = sources();
    const broken = new FakeRecordSource('historical', [
      { objectId: 1, date: '2021-03-01', cases: { total: 'ten' } },
    ]);

    await expect(downloadSeries({ ...fakes, historical: broken }, { logger })).rejects.toThrow(
      MalformedFieldError
    );
  });
});
