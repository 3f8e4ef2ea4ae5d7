/**
 * Cache File Schema
 *
 * @module packages/cli/cache/schema
 */

import { z } from 'zod';
import type { CachedSeries, FinalizedDataPoint } from '@epitrend/core';

const counterSchema = z.object({
  total: z.number(),
  increase: z.number(),
});

export const finalizedDataPointSchema = z.object({
  objectId: z.number().int(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  incidence: z.number(),
  cases: counterSchema.extend({ reported: z.number() }),
  deaths: counterSchema,
  recoveries: counterSchema,
  hospitalisations: counterSchema.extend({ bedsInUse: z.number() }),
});

export const cacheFileSchema = z.object({
  createdAt: z.string().datetime(),
  points: z.array(finalizedDataPointSchema),
});

export type CacheFile = z.infer<typeof cacheFileSchema>;

/**
 * Serialize a series for the cache file.
 */
export function toCacheFile(createdAt: Date, points: readonly FinalizedDataPoint[]): CacheFile {
  return { createdAt: createdAt.toISOString(), points: [...points] };
}

/**
 * Validate and revive a parsed cache file.
 *
 * @returns null when the content does not match the schema
 */
export function fromCacheFile(content: unknown): CachedSeries | null {
  const result = cacheFileSchema.safeParse(content);
  if (!result.success) {
    return null;
  }
  return { createdAt: new Date(result.data.createdAt), points: result.data.points };
}
