/**
 * Academic fetcher
 *
 * One paper-search query per call. The search call retries on 429 only and
 * runs behind a single-slot gate shared by every academic query. Each paper
 * then passes the citation and relevance gates before its body is chosen.
 */

import type { LimitFunction } from "p-limit";
import type {
  PaperResultItem,
  PaperSearchProvider,
} from "../../interfaces/search-provider";
import {
  ABSTRACT_PLACEHOLDER,
  DEFAULT_TITLE,
  createAcademicRecord,
  type AcademicRecord,
} from "../../models/evidence-record";
import type { TextFetcher } from "../page-fetcher";
import { passesCitationGate } from "../filters/citation-gate";
import type { RelevanceGate } from "../filters/relevance-gate";
import { withRetry, type Sleep } from "../../utils/retry";
import {
  describeError,
  isRateLimitError,
  isTransientError,
} from "../../utils/errors";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "academic-fetcher" });

export interface AcademicFetcherOptions {
  provider: PaperSearchProvider;
  pages: TextFetcher;
  gate: LimitFunction;
  relevanceGate?: RelevanceGate;
  resultsPerQuery: number;
  maxAttempts: number;
  backoffBaseMs: number;
  minCitationCount: number;
  abstractMinLength: number; // Abstracts this long are used verbatim
  sleep?: Sleep;
}

export class AcademicFetcher {
  constructor(private readonly options: AcademicFetcherOptions) {}

  /**
   * Records for one query, in source order. Never throws.
   */
  async fetch(query: string, subject?: string): Promise<AcademicRecord[]> {
    const papers = await this.search(query);
    const records = await Promise.all(
      papers.map((paper) => this.processPaper(paper, subject))
    );
    return records.filter(
      (record): record is AcademicRecord => record !== null
    );
  }

  private async search(query: string): Promise<PaperResultItem[]> {
    const { provider, gate } = this.options;

    try {
      return await withRetry(
        () =>
          gate(() =>
            provider.searchPapers(query, this.options.resultsPerQuery)
          ),
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.backoffBaseMs,
          strategy: "exponential",
          isRetryable: isTransientError,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) => {
            log.warn(
              { query, attempt, delayMs, error: describeError(error) },
              isRateLimitError(error)
                ? `${provider.getName()} rate limit (429), backing off`
                : `${provider.getName()} transient failure, backing off`
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
      return [];
    }
  }

  private async processPaper(
    paper: PaperResultItem,
    subject?: string
  ): Promise<AcademicRecord | null> {
    const record = createAcademicRecord({
      title: paper.title,
      body: "",
      url: paper.url || paper.openAccessPdfUrl || "",
      abstract: paper.abstract,
      metadata: {
        year: paper.year,
        venue: paper.venue,
        citations: paper.citationCount,
        authors: paper.authors,
        hasOpenAccess: paper.hasOpenAccess,
      },
    });

    if (!passesCitationGate(record, this.options.minCitationCount)) {
      log.debug(
        { title: record.title, citations: record.metadata.citations },
        "Paper below citation threshold"
      );
      return null;
    }

    const { relevanceGate } = this.options;
    if (subject && relevanceGate) {
      const relevant = await relevanceGate.isRelevant(
        subject,
        paper.title || DEFAULT_TITLE,
        paper.abstract
      );
      if (!relevant) {
        log.debug({ title: record.title }, "Paper judged not relevant");
        return null;
      }
    }

    record.body = await this.selectBody(paper);
    return record;
  }

  /**
   * Long abstract verbatim, else full text when it is longer than the
   * abstract, else whatever abstract there is
   */
  private async selectBody(paper: PaperResultItem): Promise<string> {
    const abstract = paper.abstract ?? "";
    if (abstract.length >= this.options.abstractMinLength) {
      return abstract;
    }

    const fullTextUrl = paper.openAccessPdfUrl || paper.url;
    if (fullTextUrl) {
      const text = await this.options.pages.fetchText(fullTextUrl);
      if (text.length > abstract.length) {
        return text;
      }
    }

    return abstract || ABSTRACT_PLACEHOLDER;
  }
}
