/**
 * Brave Search API service
 */

export { BraveSearchClient } from "./client";
export type { BraveSearchClientOptions } from "./client";
export type {
  SearchFilters,
  BraveSearchResult,
  BraveSearchResponse,
} from "./types";
