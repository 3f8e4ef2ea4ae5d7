/**
 * CLI Configuration
 *
 * Reads EPITREND_* environment variables into a validated configuration
 * object. Endpoints, user agent and cache location are configuration
 * values so the CLI can be pointed at mirrors or test fixtures.
 *
 * @module packages/cli/config
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigValidationError } from '@epitrend/core';

export const VERSION = '0.1.0';

const DEFAULT_HISTORICAL_URL =
  'https://opendata.dresden.de/duva2ckan/files/de-sn-dresden-corona_-_covid-19_-_fallzahlen_md1_dresden_2020/content';

const DEFAULT_FEED_URL =
  'https://services.arcgis.com/ORpvigFPJUhb8RDF/arcgis/rest/services/corona_DD_7_Sicht/FeatureServer/0/query';

const DEFAULT_POPULATION_URL =
  'https://opendata.dresden.de/duva2ckan/files/de-sn-dresden-einwohner___md_34e_2020_-_3006_od_bevoelkerung_ab_stadtteil_hauptwohner_geschlecht_deutsche__auslaender/content';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Upstream sources
  historicalCsvUrl: z.string().url('EPITREND_HISTORICAL_URL must be a valid URL'),
  feedUrl: z.string().url('EPITREND_FEED_URL must be a valid URL'),
  populationUrl: z.string().url('EPITREND_POPULATION_URL must be a valid URL'),
  feedPageSize: z.number().int().min(1),
  userAgent: z.string().min(1),

  // Local state
  cacheDir: z.string().min(1),

  // Presentation
  logLevel: z.enum(LOG_LEVELS).optional(),
  locale: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Default cache directory, following the XDG base directory layout
 */
export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.XDG_CACHE_HOME) {
    return join(env.XDG_CACHE_HOME, 'epitrend');
  }
  return join(homedir(), '.cache', 'epitrend');
}

/**
 * Parse environment variables into configuration
 *
 * @throws ConfigValidationError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    historicalCsvUrl: env.EPITREND_HISTORICAL_URL || DEFAULT_HISTORICAL_URL,
    feedUrl: env.EPITREND_FEED_URL || DEFAULT_FEED_URL,
    populationUrl: env.EPITREND_POPULATION_URL || DEFAULT_POPULATION_URL,
    feedPageSize: env.EPITREND_FEED_PAGE_SIZE ? Number(env.EPITREND_FEED_PAGE_SIZE) : 1000,
    userAgent: env.EPITREND_USER_AGENT || `epitrend/${VERSION}`,
    cacheDir: env.EPITREND_CACHE_DIR || defaultCacheDir(env),
    logLevel: env.EPITREND_LOG || undefined,
    locale: env.EPITREND_LOCALE || env.LC_ALL || env.LC_MESSAGES || env.LANG || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(errors);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
