/**
 * Data Service
 *
 * Decides between the cached series and a fresh download, and keeps the
 * cache up to date after every download.
 *
 * @module packages/cli/services/dataService
 */

import ms from 'ms';
import { CacheUnavailableError } from '@epitrend/core';
import type { FinalizedDataPoint, ICacheStore } from '@epitrend/core';
import type { Logger } from '../logger.js';

export interface DataRequest {
  /** Ignore the cache and download */
  force?: boolean;
  /** Use the cache only, regardless of its age; never download */
  cacheOnly?: boolean;
  /** Age at which the cache is no longer used */
  staleAfterMs: number;
}

export interface SeriesResult {
  points: FinalizedDataPoint[];
  origin: 'cache' | 'download';
  createdAt: Date;
}

export interface DataServiceOptions {
  store: ICacheStore;
  download: () => Promise<FinalizedDataPoint[]>;
  logger: Logger;
  now?: () => Date;
}

/**
 * Whether a series created at `createdAt` is too old to use at `now`.
 */
export function isStale(createdAt: Date, staleAfterMs: number, now: Date): boolean {
  return now.getTime() - createdAt.getTime() >= staleAfterMs;
}

export class DataService {
  private readonly store: ICacheStore;
  private readonly download: () => Promise<FinalizedDataPoint[]>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DataServiceOptions) {
    this.store = options.store;
    this.download = options.download;
    this.logger = options.logger.child({ component: 'data-service' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Current series, from the cache when it is usable, else downloaded.
   *
   * @throws CacheUnavailableError when `cacheOnly` is set and there is no cache
   */
  async current(request: DataRequest): Promise<SeriesResult> {
    if (request.force) {
      this.logger.debug('Ignoring cache since --force was given');
      return this.refresh();
    }

    const cached = await this.store.load();

    if (request.cacheOnly) {
      if (!cached) {
        throw new CacheUnavailableError();
      }
      this.logger.debug({ createdAt: cached.createdAt }, 'Using cached data');
      return { points: cached.points, origin: 'cache', createdAt: cached.createdAt };
    }

    if (cached) {
      const now = this.now();
      const age = now.getTime() - cached.createdAt.getTime();
      const stale = isStale(cached.createdAt, request.staleAfterMs, now);
      this.logger.trace(
        { createdAt: cached.createdAt, age: ms(Math.max(0, age), { long: true }), current: !stale },
        'Cached data'
      );
      if (!stale) {
        this.logger.debug({ createdAt: cached.createdAt }, 'Using cached data');
        return { points: cached.points, origin: 'cache', createdAt: cached.createdAt };
      }
    }

    return this.refresh();
  }

  /**
   * Download a fresh series and store it in the cache.
   */
  async refresh(): Promise<SeriesResult> {
    this.logger.debug('Downloading new data');
    const points = await this.download();
    const createdAt = this.now();
    await this.store.store(points);
    return { points, origin: 'download', createdAt };
  }
}
