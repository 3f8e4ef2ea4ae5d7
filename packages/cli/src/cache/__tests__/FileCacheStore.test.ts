import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { reconcile } from '@epitrend/core';
import type { FinalizedDataPoint, NormalizedRecord } from '@epitrend/core';
import { FileCacheStore, CACHE_FILE } from '../FileCacheStore.js';
import { CacheLock } from '../CacheLock.js';
import { createSilentLogger } from '../../logger.js';

const CREATED_AT = new Date('2021-03-02T08:00:00.000Z');

function record(objectId: number, date: string, total: number, reported: number): NormalizedRecord {
  return {
    objectId,
    date,
    cases: { total, increase: 0, reported },
    deaths: { total: 1, increase: 0 },
    recoveries: { total: 2, increase: 0 },
    hospitalisations: { total: 3, increase: 0, bedsInUse: 4 },
  };
}

const POINTS: FinalizedDataPoint[] = reconcile(
  [record(1, '2021-03-01', 10, 10), record(2, '2021-03-02', 30, 20)],
  100_000
);

describe('FileCacheStore', () => {
  let dir: string;
  let store: FileCacheStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'epitrend-cache-'));
    store = new FileCacheStore({ dir, logger: createSilentLogger(), now: () => CREATED_AT });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report its location', () => {
    expect(store.location).toBe(join(dir, CACHE_FILE));
  });

  it('should return null when nothing is cached', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('should store and load a series', async () => {
    await store.store(POINTS);

    const cached = await store.load();

    expect(cached?.createdAt.toISOString()).toBe('2021-03-02T08:00:00.000Z');
    expect(cached?.points).toEqual(POINTS);
  });

  it('should write the documented file format', async () => {
    await store.store(POINTS);

    const content: unknown = JSON.parse(await fs.readFile(join(dir, CACHE_FILE), 'utf-8'));

    expect(content).toEqual({ createdAt: '2021-03-02T08:00:00.000Z', points: POINTS });
  });

  it('should leave no temporary files or locks behind', async () => {
    await store.store(POINTS);

    expect((await fs.readdir(dir)).sort()).toEqual([CACHE_FILE, 'locks']);
    expect(await fs.readdir(join(dir, 'locks'))).toEqual([]);
  });

  it('should create the cache directory on store', async () => {
    const nested = new FileCacheStore({
      dir: join(dir, 'nested', 'epitrend'),
      logger: createSilentLogger(),
    });

    await nested.store(POINTS);

    await expect(fs.access(join(dir, 'nested', 'epitrend', CACHE_FILE))).resolves.toBeUndefined();
  });

  it('should treat invalid JSON as no cache', async () => {
    await fs.writeFile(join(dir, CACHE_FILE), '{"createdAt":', 'utf-8');

    await expect(store.load()).resolves.toBeNull();
  });

  it('should treat an unexpected shape as no cache', async () => {
    await fs.writeFile(join(dir, CACHE_FILE), JSON.stringify({ created: 'yesterday' }), 'utf-8');

    await expect(store.load()).resolves.toBeNull();
  });

  it('should treat a write-locked cache as no cache', async () => {
    await store.store(POINTS);
    await new CacheLock({ dir, logger: createSilentLogger() }).acquireWrite();

    await expect(store.load()).resolves.toBeNull();
  });

  it('should skip storing while a reader holds the cache', async () => {
    await new CacheLock({ dir, logger: createSilentLogger() }).acquireRead();

    await expect(store.store(POINTS)).resolves.toBeUndefined();
    await expect(fs.access(join(dir, CACHE_FILE))).rejects.toThrow();
  });

  it('should replace an existing series', async () => {
    await store.store(POINTS);
    await store.store(POINTS.slice(0, 1));

    expect((await store.load())?.points).toHaveLength(1);
  });

  it('should remove the cache', async () => {
    await store.store(POINTS);

    await store.remove();

    await expect(store.load()).resolves.toBeNull();
    await expect(fs.access(join(dir, CACHE_FILE))).rejects.toThrow();
  });

  it('should succeed removing a missing cache', async () => {
    await expect(store.remove()).resolves.toBeUndefined();
  });
});
