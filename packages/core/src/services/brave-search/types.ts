/**
 * Type definitions for Brave Search service
 */

import { z } from "zod";

/**
 * Search filters for customizing queries
 */
export interface SearchFilters {
  // Location/language
  country?: string; // ISO 3166-1 alpha-2 country code (e.g., "US", "GB")
  language?: string; // ISO 639-1 language code (e.g., "en", "es")

  // Result configuration
  count?: number; // Number of results to return (default: 10, max: 20)

  // Content filtering
  safesearch?: "off" | "moderate" | "strict";
}

/**
 * Single search result from Brave
 */
export interface BraveSearchResult {
  title: string;
  url: string;
  description: string;
  published_date?: string;
  language?: string;
}

/**
 * Brave Search API response
 */
export interface BraveSearchResponse {
  query: string;
  results: BraveSearchResult[];
  totalResults: number;
}

/**
 * Raw payload shape of GET /res/v1/web/search (only the fields we read)
 */
export const BraveApiPayloadSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().nullish(),
            url: z.string().nullish(),
            description: z.string().nullish(),
            age: z.string().nullish(),
            language: z.string().nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

export type BraveApiPayload = z.infer<typeof BraveApiPayloadSchema>;
