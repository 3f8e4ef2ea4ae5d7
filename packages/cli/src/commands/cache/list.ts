/**
 * Cache List Command
 *
 * Prints the cache location and creation time, tab separated, when a
 * usable cache exists; prints nothing otherwise.
 *
 * @module packages/cli/commands/cache/list
 */

import type { ICacheStore } from '@epitrend/core';

/**
 * The line printed for a cache, or null when there is none
 */
export async function describeCache(store: ICacheStore): Promise<string | null> {
  const cached = await store.load();
  if (!cached) {
    return null;
  }
  return `${store.location}\t${cached.createdAt.toISOString()}`;
}

export async function listCommand(store: ICacheStore): Promise<void> {
  const line = await describeCache(store);
  if (line !== null) {
    console.log(line);
  }
}
