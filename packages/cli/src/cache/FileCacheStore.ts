/**
 * File Cache Store
 *
 * Keeps the last finalized series in `<cacheDir>/cached_data.json`.
 *
 * The cache never fails a run: permission problems, lock contention and
 * unreadable content are logged as warnings and treated as "no cache".
 * Unexpected errors still propagate.
 *
 * @module packages/cli/cache/FileCacheStore
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { isEpitrendError, ErrorCodes } from '@epitrend/core';
import type { CachedSeries, FinalizedDataPoint, ICacheStore } from '@epitrend/core';
import type { Logger } from '../logger.js';
import { CacheLock, errnoCode } from './CacheLock.js';
import { fromCacheFile, toCacheFile } from './schema.js';

/** Cache file name */
export const CACHE_FILE = 'cached_data.json';

const SOFT_ERRNO_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

export interface FileCacheStoreOptions {
  dir: string;
  logger: Logger;
  /** Clock used to stamp stored series */
  now?: () => Date;
  lockStaleMs?: number;
}

export class FileCacheStore implements ICacheStore {
  readonly location: string;

  private readonly dir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lock: CacheLock;

  constructor(options: FileCacheStoreOptions) {
    this.dir = options.dir;
    this.location = join(options.dir, CACHE_FILE);
    this.logger = options.logger.child({ component: 'cache' });
    this.now = options.now ?? (() => new Date());
    this.lock = new CacheLock({ dir: options.dir, logger: options.logger, staleMs: options.lockStaleMs });
  }

  async load(): Promise<CachedSeries | null> {
    if (!(await this.exists())) {
      this.logger.debug({ path: this.location }, 'No cached data');
      return null;
    }

    let content: string;
    try {
      content = await this.lock.withLock('read', () => fs.readFile(this.location, 'utf-8'));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      return this.soft(error, 'Could not read cached data');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return this.soft(error, 'Cached data is not valid JSON');
    }

    const series = fromCacheFile(parsed);
    if (!series) {
      this.logger.warn({ path: this.location }, 'Cached data has an unexpected shape; ignoring it');
      return null;
    }

    this.logger.debug({ path: this.location, createdAt: series.createdAt }, 'Loaded cached data');
    return series;
  }

  async store(points: readonly FinalizedDataPoint[]): Promise<void> {
    const content = JSON.stringify(toCacheFile(this.now(), points));

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await this.lock.withLock('write', async () => {
        // Write atomically (write to temp, then rename)
        const tempPath = `${this.location}.${process.pid}.tmp`;
        await fs.writeFile(tempPath, content, 'utf-8');
        await fs.rename(tempPath, this.location);
      });
      this.logger.debug({ path: this.location, count: points.length }, 'Stored data in cache');
    } catch (error) {
      this.soft(error, 'Could not store data in cache');
    }
  }

  async remove(): Promise<void> {
    if (!(await this.exists())) {
      return;
    }

    try {
      await this.lock.withLock('write', async () => {
        try {
          await fs.unlink(this.location);
        } catch (error) {
          if (errnoCode(error) !== 'ENOENT') {
            throw error;
          }
        }
      });
      this.logger.debug({ path: this.location }, 'Removed cached data');
    } catch (error) {
      this.soft(error, 'Could not remove cached data');
    }
  }

  private async exists(): Promise<boolean> {
    try {
      await fs.access(this.location);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      this.soft(error, 'Could not access cached data');
      return false;
    }
  }

  /**
   * Log a recoverable cache failure and continue without cache; rethrow anything else.
   */
  private soft(error: unknown, message: string): null {
    const code = errnoCode(error);
    const recoverable =
      (code !== undefined && SOFT_ERRNO_CODES.has(code)) ||
      error instanceof SyntaxError ||
      (isEpitrendError(error) && error.code === ErrorCodes.CACHE_LOCKED);

    if (!recoverable) {
      throw error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    this.logger.warn({ path: this.location, reason }, message);
    return null;
  }
}
