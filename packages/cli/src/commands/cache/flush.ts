/**
 * Cache Flush Command
 *
 * @module packages/cli/commands/cache/flush
 */

import type { ICacheStore } from '@epitrend/core';

export async function flushCommand(store: ICacheStore): Promise<void> {
  await store.remove();
}
