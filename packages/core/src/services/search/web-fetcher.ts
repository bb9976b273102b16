/**
 * Web fetcher
 *
 * One web-search query per call: search with backoff on transient errors,
 * then download every result page concurrently. The concurrency gate is held
 * only for the search call itself; page downloads are not gated.
 */

import type { LimitFunction } from "p-limit";
import type {
  SearchFilters,
  SearchProvider,
  SearchResponse,
} from "../../interfaces/search-provider";
import {
  createWebRecord,
  type WebRecord,
} from "../../models/evidence-record";
import type { TextFetcher } from "../page-fetcher";
import { withRetry, type Sleep } from "../../utils/retry";
import {
  describeError,
  isRateLimitError,
  isTransientError,
} from "../../utils/errors";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "web-fetcher" });

export interface WebFetcherOptions {
  provider: SearchProvider;
  pages: TextFetcher;
  gate: LimitFunction;
  maxRetries: number; // Retries after the first call
  backoffBaseMs: number;
  filters?: SearchFilters;
  sleep?: Sleep;
}

export class WebFetcher {
  constructor(private readonly options: WebFetcherOptions) {}

  /**
   * Records for one query, in search-result order. Never throws.
   */
  async fetch(query: string): Promise<WebRecord[]> {
    const response = await this.search(query);
    if (!response) {
      return [];
    }

    const results = response.results.filter((result) => result.url);
    const bodies = await Promise.all(
      results.map((result) => this.options.pages.fetchText(result.url))
    );

    const records: WebRecord[] = [];
    results.forEach((result, index) => {
      const body = bodies[index];
      if (!body) {
        return;
      }
      records.push(
        createWebRecord({
          title: result.title,
          body,
          url: result.url,
          description: result.description || undefined,
        })
      );
    });

    log.debug(
      { query, results: results.length, records: records.length },
      "Web query complete"
    );
    return records;
  }

  private async search(query: string): Promise<SearchResponse | null> {
    const { provider, gate, filters } = this.options;

    try {
      return await withRetry(
        () => gate(() => provider.search(query, filters)),
        {
          maxAttempts: this.options.maxRetries + 1,
          baseDelayMs: this.options.backoffBaseMs,
          strategy: "exponential",
          isRetryable: isTransientError,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) => {
            log.warn(
              { query, attempt, delayMs, error: describeError(error) },
              isRateLimitError(error)
                ? `${provider.getName()} rate limit (429), backing off`
                : `${provider.getName()} request failed, backing off`
            );
          },
        }
      );
    } catch (error) {
      log.error(
        { query, error: describeError(error) },
        isRateLimitError(error)
          ? `${provider.getName()} rate limit exceeded after retries`
          : `${provider.getName()} search failed`
      );
      return null;
    }
  }
}
