/**
 * Cache Lock
 *
 * Advisory shared/exclusive locking for the cache file, built from plain
 * lock files so that concurrent CLI invocations do not read a half-written
 * cache or overwrite each other.
 *
 * ```
 * <cacheDir>/locks/
 * ├── write.lock          exclusive, created with the `wx` flag
 * └── read-<id>.lock      one per active reader
 * ```
 *
 * A writer fails while any live read lock exists; a reader fails while a
 * live write lock exists. Lock files older than the stale threshold are
 * left over from crashed processes and removed.
 *
 * @module packages/cli/cache/CacheLock
 */

import { promises as fs } from 'node:fs';
import { hostname } from 'node:os';
import { join } from 'node:path';
import { CacheLockError } from '@epitrend/core';
import type { Logger } from '../logger.js';

// ============================================================================
// Constants
// ============================================================================

/** Lock file stale threshold (10 minutes) */
export const LOCK_STALE_MS = 10 * 60 * 1000;

const WRITE_LOCK = 'write.lock';
const READ_LOCK_PREFIX = 'read-';

// ============================================================================
// Types
// ============================================================================

export type LockMode = 'read' | 'write';

export interface LockInfo {
  id: string;
  mode: LockMode;
  who: string;
  pid: number;
  created: string;
}

export interface LockHandle {
  info: LockInfo;
  path: string;
}

/**
 * Generate a unique lock ID
 */
export function generateLockId(): string {
  const random = Math.random().toString(36).slice(2, 10);
  return `lock-${Date.now().toString(36)}-${random}`;
}

/**
 * Extract the errno code of a file-system error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// ============================================================================
// CacheLock
// ============================================================================

export interface CacheLockOptions {
  /** Directory holding the cache file */
  dir: string;
  logger: Logger;
  staleMs?: number;
}

export class CacheLock {
  private readonly lockDir: string;
  private readonly logger: Logger;
  private readonly staleMs: number;

  constructor(options: CacheLockOptions) {
    this.lockDir = join(options.dir, 'locks');
    this.logger = options.logger.child({ component: 'cache-lock' });
    this.staleMs = options.staleMs ?? LOCK_STALE_MS;
  }

  get directory(): string {
    return this.lockDir;
  }

  // ==========================================================================
  // Core Operations
  // ==========================================================================

  /**
   * Take a shared lock.
   *
   * @throws CacheLockError if a live write lock exists
   */
  async acquireRead(): Promise<LockHandle> {
    await fs.mkdir(this.lockDir, { recursive: true });

    if (await this.isLive(join(this.lockDir, WRITE_LOCK))) {
      throw new CacheLockError(this.lockDir, 'read');
    }

    const info = this.createInfo('read');
    const path = join(this.lockDir, `${READ_LOCK_PREFIX}${info.id}.lock`);
    await fs.writeFile(path, JSON.stringify(info, null, 2), { encoding: 'utf-8', flag: 'wx' });

    this.logger.trace({ path }, 'Read lock acquired');
    return { info, path };
  }

  /**
   * Take the exclusive lock.
   *
   * @throws CacheLockError if another writer or a live reader holds the cache
   */
  async acquireWrite(): Promise<LockHandle> {
    await fs.mkdir(this.lockDir, { recursive: true });

    const path = join(this.lockDir, WRITE_LOCK);
    const info = this.createInfo('write');

    let created = await this.tryCreate(path, info);
    if (!created && !(await this.isLive(path))) {
      // Stale lock was removed; another process may still win the retry
      created = await this.tryCreate(path, info);
    }
    if (!created) {
      throw new CacheLockError(this.lockDir, 'write');
    }

    const handle = { info, path };
    if (await this.hasLiveReaders()) {
      await this.release(handle);
      throw new CacheLockError(this.lockDir, 'write');
    }

    this.logger.trace({ path }, 'Write lock acquired');
    return handle;
  }

  /**
   * Release a lock. Releasing a lock that is already gone succeeds.
   */
  async release(handle: LockHandle): Promise<void> {
    try {
      await fs.unlink(handle.path);
      this.logger.trace({ path: handle.path }, 'Lock released');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  // ==========================================================================
  // High-Level Operations
  // ==========================================================================

  /**
   * Run an operation under a lock, releasing it even if the operation throws
   */
  async withLock<T>(mode: LockMode, operation: () => Promise<T>): Promise<T> {
    const handle = mode === 'read' ? await this.acquireRead() : await this.acquireWrite();
    try {
      return await operation();
    } finally {
      await this.release(handle);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private createInfo(mode: LockMode): LockInfo {
    return {
      id: generateLockId(),
      mode,
      who: `${process.env.USER ?? 'unknown'}@${hostname()}`,
      pid: process.pid,
      created: new Date().toISOString(),
    };
  }

  /**
   * Create a lock file exclusively; false if it already exists
   */
  private async tryCreate(path: string, info: LockInfo): Promise<boolean> {
    try {
      await fs.writeFile(path, JSON.stringify(info, null, 2), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Whether a lock file exists and is not stale. Stale files are removed.
   */
  private async isLive(path: string): Promise<boolean> {
    let modified: number;
    try {
      modified = (await fs.stat(path)).mtimeMs;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }

    if (Date.now() - modified < this.staleMs) {
      return true;
    }

    this.logger.warn({ path }, 'Removing stale cache lock');
    try {
      await fs.unlink(path);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw error;
      }
    }
    return false;
  }

  private async hasLiveReaders(): Promise<boolean> {
    const entries = await fs.readdir(this.lockDir);
    for (const entry of entries) {
      if (entry.startsWith(READ_LOCK_PREFIX) && (await this.isLive(join(this.lockDir, entry)))) {
        return true;
      }
    }
    return false;
  }
}
