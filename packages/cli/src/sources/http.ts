/**
 * HTTP Client
 *
 * Thin wrapper around fetch that sets the user agent and a timeout and
 * turns transport failures and non-2xx responses into FetchErrors.
 *
 * @module packages/cli/sources/http
 */

import { FetchError } from '@epitrend/core';
import type { Logger } from '../logger.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  logger: Logger;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
}

export class HttpClient {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: 'http' });
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * GET a URL and return the response body as text.
   *
   * @throws FetchError on network failure, timeout or non-2xx status
   */
  async getText(url: string): Promise<string> {
    const response = await this.get(url);
    return response.text();
  }

  /**
   * GET a URL and parse the response body as JSON.
   *
   * @throws FetchError on network failure, timeout, non-2xx status or invalid JSON
   */
  async getJson(url: string): Promise<unknown> {
    const text = await this.getText(url);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new FetchError(`Response from ${url} is not valid JSON`, {
        url,
        invalidPayload: true,
        cause: error,
      });
    }
  }

  private async get(url: string): Promise<Response> {
    this.logger.debug({ url }, 'GET');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Request to ${url} failed: ${reason}`, { url, cause: error });
    }

    if (!response.ok) {
      throw new FetchError(`Request to ${url} failed with status ${response.status}`, {
        url,
        status: response.status,
      });
    }

    this.logger.trace({ url, status: response.status }, 'Response received');
    return response;
  }
}
