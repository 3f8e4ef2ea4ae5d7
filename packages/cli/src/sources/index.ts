/**
 * Upstream Sources
 *
 * @module packages/cli/sources
 */

export { HttpClient } from './http.js';
export type { FetchLike, HttpClientOptions } from './http.js';
export { HistoricalCsvSource, historicalRowToRecord, HistoricalColumns } from './HistoricalCsvSource.js';
export { FeedSource, feedAttributesToRecord, feedResponseSchema } from './FeedSource.js';
export type { FeedAttributes, FeedSourceOptions } from './FeedSource.js';
export { PopulationCsvSource, sumPopulation } from './PopulationCsvSource.js';
export { parseSemicolonCsv } from './csv.js';
