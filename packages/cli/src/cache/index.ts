/**
 * Cache
 *
 * @module packages/cli/cache
 */

export { FileCacheStore, CACHE_FILE } from './FileCacheStore.js';
export type { FileCacheStoreOptions } from './FileCacheStore.js';
export { CacheLock, LOCK_STALE_MS, generateLockId, errnoCode } from './CacheLock.js';
export type { LockHandle, LockInfo, LockMode, CacheLockOptions } from './CacheLock.js';
export { cacheFileSchema, fromCacheFile, toCacheFile } from './schema.js';
export type { CacheFile } from './schema.js';
