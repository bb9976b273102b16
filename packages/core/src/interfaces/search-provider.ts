/**
 * Search Provider Interfaces
 *
 * Abstract interfaces for the two kinds of source the pipeline reads:
 * web search (Brave) and academic paper search (Semantic Scholar).
 * Implementations make a single call and throw on failure; retry and
 * concurrency limits belong to the fetchers that use them.
 */

/**
 * Search filters for customizing queries
 */
export interface SearchFilters {
  // Location/language
  country?: string; // ISO 3166-1 alpha-2 country code (e.g., "US", "GB")
  language?: string; // ISO 639-1 language code (e.g., "en", "es")

  // Result configuration
  count?: number; // Number of results to return

  // Content filtering
  safesearch?: "off" | "moderate" | "strict"; // Safe search level
}

/**
 * Single web search result (provider-agnostic)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  publishedDate?: string;
  language?: string;
}

/**
 * Web search response (provider-agnostic)
 */
export interface SearchResponse {
  query: string; // The query that was executed
  results: SearchResultItem[];
  totalResults: number;
}

/**
 * Web search provider
 */
export interface SearchProvider {
  /**
   * Execute a single web search
   */
  search(query: string, filters?: SearchFilters): Promise<SearchResponse>;

  /**
   * Get the provider name
   */
  getName(): string;
}

/**
 * Single paper (provider-agnostic). Absent fields stay undefined.
 */
export interface PaperResultItem {
  title?: string;
  abstract?: string;
  url?: string;
  year?: number;
  venue?: string;
  citationCount?: number;
  authors: string[];
  openAccessPdfUrl?: string;
  hasOpenAccess: boolean;
}

/**
 * Academic paper search provider
 */
export interface PaperSearchProvider {
  searchPapers(query: string, limit?: number): Promise<PaperResultItem[]>;

  getName(): string;
}
