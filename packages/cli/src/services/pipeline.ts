/**
 * Download Pipeline
 *
 * Fetches the population and both record sources, normalizes them and
 * reconciles them into one finalized series: the historical export is
 * reconciled first, then the feed records that extend it are reconciled
 * seeded from the historical tail.
 *
 * @module packages/cli/services/pipeline
 */

import {
  isChronological,
  newerThan,
  normalizeRecords,
  reconcile,
  resumeStateFrom,
} from '@epitrend/core';
import type {
  FinalizedDataPoint,
  IncreasePolicy,
  IPopulationSource,
  IRecordSource,
  MissingDateError,
  NormalizedRecord,
  RawRecord,
} from '@epitrend/core';
import type { Logger } from '../logger.js';

export interface PipelineSources {
  historical: IRecordSource;
  feed: IRecordSource;
  population: IPopulationSource;
}

export interface PipelineOptions {
  logger: Logger;
  increasePolicy?: IncreasePolicy;
}

/**
 * Download and reconcile the full series.
 */
export async function downloadSeries(
  sources: PipelineSources,
  options: PipelineOptions
): Promise<FinalizedDataPoint[]> {
  const logger = options.logger.child({ component: 'pipeline' });

  const [population, historicalRaw] = await Promise.all([
    sources.population.fetch(),
    sources.historical.fetch(),
  ]);
  const historical = normalize(sources.historical.name, historicalRaw, logger);

  const feedRaw = await sources.feed.fetch({ offset: historicalRaw.length });
  const incremental = newerThan(historical, normalize(sources.feed.name, feedRaw, logger));

  if (!isChronological(historical) || !isChronological(incremental)) {
    logger.warn('Records are not in strictly ascending date order');
  }

  const points = reconcile(historical, population, { increasePolicy: options.increasePolicy });
  const tail = reconcile(incremental, population, {
    seed: resumeStateFrom(points),
    increasePolicy: options.increasePolicy,
  });

  logger.info(
    { population, historical: points.length, incremental: tail.length },
    'Series reconciled'
  );
  return [...points, ...tail];
}

function normalize(source: string, raws: readonly RawRecord[], logger: Logger): NormalizedRecord[] {
  return normalizeRecords(raws, {
    onDropped: (error: MissingDateError) => {
      logger.warn({ source, objectId: error.objectId }, 'Dropping record without a date');
    },
  });
}
