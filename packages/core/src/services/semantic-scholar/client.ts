/**
 * Semantic Scholar API client
 *
 * Works without a key (shared public rate limit); a key is sent as
 * x-api-key when configured. Non-2xx answers surface as HttpStatusError.
 */

import {
  PAPER_FIELDS,
  PaperSearchPayloadSchema,
  type PaperSearchResponse,
} from "./types";
import { HttpStatusError } from "../../utils/errors";

const PAPER_SEARCH_API_URL =
  "https://api.semanticscholar.org/graph/v1/paper/search";
const DEFAULT_LIMIT = 20;
const DEFAULT_TIMEOUT_MS = 15000;

export interface SemanticScholarClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class SemanticScholarClient {
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SemanticScholarClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Keyword search over papers (single call, no retry)
   */
  async searchPapers(
    query: string,
    limit: number = DEFAULT_LIMIT
  ): Promise<PaperSearchResponse> {
    const params = new URLSearchParams({
      query,
      limit: limit.toString(),
      fields: PAPER_FIELDS,
    });

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.apiKey) {
      headers["x-api-key"] = this.apiKey;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(
        `${PAPER_SEARCH_API_URL}?${params.toString()}`,
        { method: "GET", headers, signal: controller.signal }
      );

      if (!response.ok) {
        const errorText = await response.text();
        throw new HttpStatusError(response.status, PAPER_SEARCH_API_URL, errorText);
      }

      const data = PaperSearchPayloadSchema.parse(await response.json());
      return { query, papers: data.data ?? [] };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
