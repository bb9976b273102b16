/**
 * Brave Search API client
 *
 * An explicit client object owning its credential. Rotating the key means
 * constructing a new client. Retries and concurrency are the caller's job:
 * every non-2xx answer surfaces as an HttpStatusError.
 */

import {
  BraveApiPayloadSchema,
  type SearchFilters,
  type BraveSearchResponse,
} from "./types";
import { HttpStatusError } from "../../utils/errors";

const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";
const DEFAULT_RESULT_COUNT = 10;
const DEFAULT_TIMEOUT_MS = 15000;

export interface BraveSearchClientOptions {
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class BraveSearchClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BraveSearchClientOptions) {
    if (!options.apiKey) {
      throw new Error("Brave Search API key is required");
    }
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Search the web using Brave Search API (single call, no retry)
   */
  async searchWeb(
    query: string,
    filters?: SearchFilters
  ): Promise<BraveSearchResponse> {
    // Build URL parameters
    const params = new URLSearchParams({
      q: query,
      count: (filters?.count || DEFAULT_RESULT_COUNT).toString(),
    });

    if (filters?.country) {
      params.append("country", filters.country);
    }

    if (filters?.language) {
      params.append("search_lang", filters.language);
    }

    if (filters?.safesearch) {
      params.append("safesearch", filters.safesearch);
    }

    const url = `${BRAVE_SEARCH_API_URL}?${params.toString()}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.apiKey,
        },
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new HttpStatusError(response.status, BRAVE_SEARCH_API_URL, errorText);
      }

      const data = BraveApiPayloadSchema.parse(await response.json());

      // Extract web results
      const webResults = data.web?.results || [];

      return {
        query,
        results: webResults.map((result) => ({
          title: result.title || "",
          url: result.url || "",
          description: result.description || "",
          published_date: result.age ?? undefined,
          language: result.language ?? undefined,
        })),
        totalResults: webResults.length,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
