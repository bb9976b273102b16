/**
 * Brave Search Provider Implementation
 *
 * Adapter that wraps BraveSearchClient to implement the SearchProvider interface
 */

import type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  SearchResponse,
} from "../../interfaces/search-provider";
import { BraveSearchClient } from "../brave-search/client";
import type {
  BraveSearchResponse,
  BraveSearchResult,
} from "../brave-search/types";

/**
 * Brave Search implementation of SearchProvider
 */
export class BraveSearchProvider implements SearchProvider {
  constructor(private readonly client: BraveSearchClient) {}

  /**
   * Convert Brave-specific result to generic SearchResultItem
   */
  private convertResult(braveResult: BraveSearchResult): SearchResultItem {
    return {
      title: braveResult.title,
      url: braveResult.url,
      description: braveResult.description,
      publishedDate: braveResult.published_date,
      language: braveResult.language,
    };
  }

  /**
   * Convert Brave response to generic SearchResponse
   */
  private convertResponse(braveResponse: BraveSearchResponse): SearchResponse {
    return {
      query: braveResponse.query,
      results: braveResponse.results.map((r) => this.convertResult(r)),
      totalResults: braveResponse.totalResults,
    };
  }

  /**
   * Execute a single web search
   */
  async search(
    query: string,
    filters?: SearchFilters
  ): Promise<SearchResponse> {
    const braveResponse = await this.client.searchWeb(query, filters);
    return this.convertResponse(braveResponse);
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "Brave Search";
  }
}

/**
 * Factory function to create Brave Search provider
 */
export function createBraveSearchProvider(
  apiKey: string,
  fetchImpl?: typeof fetch
): BraveSearchProvider {
  return new BraveSearchProvider(
    new BraveSearchClient({ apiKey, fetch: fetchImpl })
  );
}
