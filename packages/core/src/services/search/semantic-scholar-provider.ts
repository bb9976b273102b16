/**
 * Semantic Scholar Provider Implementation
 *
 * Adapter that wraps SemanticScholarClient to implement PaperSearchProvider
 */

import type {
  PaperResultItem,
  PaperSearchProvider,
} from "../../interfaces/search-provider";
import { SemanticScholarClient } from "../semantic-scholar/client";
import type { Paper } from "../semantic-scholar/types";

export class SemanticScholarProvider implements PaperSearchProvider {
  constructor(private readonly client: SemanticScholarClient) {}

  private convertPaper(paper: Paper): PaperResultItem {
    const authors = (paper.authors ?? [])
      .map((author) => author.name ?? "")
      .filter((name) => name.length > 0);

    return {
      title: paper.title ?? undefined,
      abstract: paper.abstract ?? undefined,
      url: paper.url ?? undefined,
      year: paper.year ?? undefined,
      venue: paper.venue || undefined,
      citationCount: paper.citationCount ?? undefined,
      authors,
      openAccessPdfUrl: paper.openAccessPdf?.url || undefined,
      hasOpenAccess: Boolean(paper.openAccessPdf),
    };
  }

  async searchPapers(
    query: string,
    limit?: number
  ): Promise<PaperResultItem[]> {
    const response = await this.client.searchPapers(query, limit);
    return response.papers.map((paper) => this.convertPaper(paper));
  }

  getName(): string {
    return "Semantic Scholar";
  }
}

export function createSemanticScholarProvider(
  apiKey?: string,
  fetchImpl?: typeof fetch
): SemanticScholarProvider {
  return new SemanticScholarProvider(
    new SemanticScholarClient({ apiKey, fetch: fetchImpl })
  );
}
