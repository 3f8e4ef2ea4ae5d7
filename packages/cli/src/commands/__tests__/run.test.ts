import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import chalk from 'chalk';
import { reconcile } from '@epitrend/core';
import { runCommand } from '../run.js';
import type { RunOptions } from '../run.js';
import type { CommandContext } from '../utils.js';
import { loadConfig } from '../../config.js';
import { createSilentLogger } from '../../logger.js';
import { DataService } from '../../services/dataService.js';
import { MemoryCacheStore } from '../../services/__tests__/fakes.js';

const POINTS = reconcile(
  [
    {
      objectId: 1,
      date: '2021-03-01',
      cases: { total: 100, increase: 0, reported: 10 },
      deaths: { total: 1, increase: 0 },
      recoveries: { total: 50, increase: 0 },
      hospitalisations: { total: 5, increase: 0, bedsInUse: 2 },
    },
  ],
  100_000
);

const OPTIONS: RunOptions = {
  verbosity: 0,
  force: false,
  cacheOnly: false,
  staleAfterMs: 60 * 60 * 1000,
  timeoutMs: 10_000,
  days: 14,
  json: false,
  ui: true,
};

function context(cached: boolean): CommandContext {
  const logger = createSilentLogger();
  const store = new MemoryCacheStore(
    cached ? { createdAt: new Date('2021-03-01T10:00:00.000Z'), points: POINTS } : null
  );
  const service = new DataService({
    store,
    logger,
    download: async () => POINTS,
    now: () => new Date('2021-03-01T10:30:00.000Z'),
  });
  return { config: loadConfig({ EPITREND_LOCALE: 'en' }), logger, store, service };
}

describe('runCommand', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the summary followed by the table', async () => {
    await runCommand(OPTIONS, context(true));

    expect(logSpy).toHaveBeenCalledTimes(3);
    expect(String(logSpy.mock.calls[0][0]).split('\n')[0]).toBe('2021-03-01');
    expect(String(logSpy.mock.calls[0][0])).toContain('   100 ( +100) total cases');
    expect(String(logSpy.mock.calls[2][0])).toContain('Incidence');
  });

  it('should print only the summary without the table', async () => {
    await runCommand({ ...OPTIONS, ui: false }, context(true));

    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it('should print the series as JSON', async () => {
    await runCommand({ ...OPTIONS, json: true }, context(true));

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toEqual({ createdAt: '2021-03-01T10:00:00.000Z', origin: 'cache', points: POINTS });
  });

  it('should exit with status 1 when offline without a cache', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(runCommand({ ...OPTIONS, cacheOnly: true }, context(false))).rejects.toThrow(
      'process.exit'
    );

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain(
      'Error: --cache is defined, but there is no cached data available [E4001]'
    );
  });
});
