/**
 * Incremental Feed Source
 *
 * A feature-service query endpoint returning the most recent days as JSON
 * features. Results are paged: the service sets `exceededTransferLimit`
 * while more records remain past the returned page.
 *
 * @module packages/cli/sources/FeedSource
 */

import { z } from 'zod';
import { FetchError } from '@epitrend/core';
import type { IRecordSource, RawRecord, RecordFetchOptions } from '@epitrend/core';
import type { HttpClient } from './http.js';
import type { Logger } from '../logger.js';

// =============================================================================
// Payload Schema
// =============================================================================

const value = z.union([z.number(), z.string()]).nullish();

export const feedAttributesSchema = z.object({
  ObjectId: z.number().int(),
  Datum: value,
  Datum_neu: value,
  Fallzahl: value,
  Zuwachs_Fallzahl: value,
  Fälle_Meldedatum: value,
  Sterbefall: value,
  Zuwachs_Sterbefall: value,
  Genesungsfall: value,
  Zuwachs_Genesung: value,
  Hospitalisierung: value,
  Zuwachs_Krankenhauseinweisung: value,
  BelegteBetten: value,
});

export type FeedAttributes = z.infer<typeof feedAttributesSchema>;

export const feedResponseSchema = z.object({
  features: z.array(z.object({ attributes: feedAttributesSchema })),
  exceededTransferLimit: z.boolean().optional(),
});

/**
 * Map feed attributes to a raw record.
 */
export function feedAttributesToRecord(attributes: FeedAttributes): RawRecord {
  return {
    objectId: attributes.ObjectId,
    date: attributes.Datum,
    dateTimestamp: attributes.Datum_neu,
    cases: {
      total: attributes.Fallzahl,
      increase: attributes.Zuwachs_Fallzahl,
      reported: attributes['Fälle_Meldedatum'],
    },
    deaths: {
      total: attributes.Sterbefall,
      increase: attributes.Zuwachs_Sterbefall,
    },
    recoveries: {
      total: attributes.Genesungsfall,
      increase: attributes.Zuwachs_Genesung,
    },
    hospitalisations: {
      total: attributes.Hospitalisierung,
      increase: attributes.Zuwachs_Krankenhauseinweisung,
      bedsInUse: attributes.BelegteBetten,
    },
  };
}

// =============================================================================
// Source
// =============================================================================

export interface FeedSourceOptions {
  url: string;
  pageSize: number;
  http: HttpClient;
  logger: Logger;
}

export class FeedSource implements IRecordSource {
  readonly name = 'feed';

  private readonly url: string;
  private readonly pageSize: number;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: FeedSourceOptions) {
    this.url = options.url;
    this.pageSize = options.pageSize;
    this.http = options.http;
    this.logger = options.logger.child({ component: 'feed-source' });
  }

  /**
   * Build the query URL for one page.
   */
  pageUrl(offset: number): string {
    const url = new URL(this.url);
    url.searchParams.set('f', 'json');
    url.searchParams.set('where', 'ObjectId>=0');
    url.searchParams.set('outFields', '*');
    url.searchParams.set('orderByFields', 'ObjectId');
    url.searchParams.set('resultOffset', String(offset));
    url.searchParams.set('resultRecordCount', String(this.pageSize));
    return url.toString();
  }

  async fetch(options: RecordFetchOptions = {}): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    let offset = options.offset ?? 0;

    for (;;) {
      const url = this.pageUrl(offset);
      this.logger.debug({ offset }, 'Reading feed page');

      const result = feedResponseSchema.safeParse(await this.http.getJson(url));
      if (!result.success) {
        const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
        throw new FetchError(`Unexpected feed payload: ${issues.join('; ')}`, {
          url,
          invalidPayload: true,
        });
      }

      const page = result.data.features.map((feature) => feedAttributesToRecord(feature.attributes));
      records.push(...page);
      offset += page.length;

      if (!result.data.exceededTransferLimit || page.length === 0) {
        break;
      }
    }

    this.logger.info({ count: records.length }, 'Feed records read');
    return records;
  }
}
