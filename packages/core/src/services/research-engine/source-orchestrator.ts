/**
 * Source orchestrator
 *
 * Fans a query set out across the web and academic fetchers, waits for
 * every task, and pools the records (web first, then academic).
 * Each source keeps its own concurrency gate: their rate limits are
 * independent, so they never share a pool.
 */

import pLimit from "p-limit";
import type { EvidenceRecord } from "../../models/evidence-record";
import type { QuerySet } from "../../models/query-set";
import type {
  PaperSearchProvider,
  SearchProvider,
} from "../../interfaces/search-provider";
import { PageFetcher } from "../page-fetcher";
import { WebFetcher } from "../search/web-fetcher";
import { AcademicFetcher } from "../search/academic-fetcher";
import { RelevanceGate, type RelevanceJudge } from "../filters/relevance-gate";
import type { ResearchConfig } from "./config";
import type { Sleep } from "../../utils/retry";
import { describeError } from "../../utils/errors";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "source-orchestrator" });

// One in-flight academic search across all queries
export const ACADEMIC_GATE_CAPACITY = 1;

export interface WebSource {
  fetch(query: string): Promise<EvidenceRecord[]>;
}

export interface AcademicSource {
  fetch(query: string, subject?: string): Promise<EvidenceRecord[]>;
}

export interface SourceDependencies {
  webProvider: SearchProvider;
  paperProvider: PaperSearchProvider;
  relevanceJudge?: RelevanceJudge;
  fetch?: typeof fetch; // Page downloads
  sleep?: Sleep;
}

export class SourceOrchestrator {
  constructor(
    private readonly web: WebSource,
    private readonly academic: AcademicSource
  ) {}

  /**
   * Run every query concurrently and pool the results.
   * A failing query contributes nothing; the batch never rejects.
   */
  async searchAll(
    querySet: QuerySet,
    subject?: string
  ): Promise<EvidenceRecord[]> {
    log.info(
      {
        general: querySet.general.length,
        academic: querySet.academic.length,
      },
      "Searching all sources"
    );

    const webTasks = querySet.general.map((query) => this.web.fetch(query));
    const academicTasks = querySet.academic.map((query) =>
      this.academic.fetch(query, subject)
    );

    const [webResults, academicResults] = await Promise.all([
      Promise.allSettled(webTasks),
      Promise.allSettled(academicTasks),
    ]);

    const records = [
      ...collect(webResults, querySet.general, "web"),
      ...collect(academicResults, querySet.academic, "academic"),
    ];

    log.info({ records: records.length }, "All sources complete");
    return records;
  }
}

function collect(
  results: PromiseSettledResult<EvidenceRecord[]>[],
  queries: string[],
  source: string
): EvidenceRecord[] {
  return results.flatMap((result, index) => {
    if (result.status === "fulfilled") {
      return result.value;
    }
    log.error(
      { source, query: queries[index], error: describeError(result.reason) },
      "Query task failed"
    );
    return [];
  });
}

/**
 * Wire both fetchers from configuration, with separate gates
 */
export function createSourceOrchestrator(
  config: ResearchConfig,
  deps: SourceDependencies
): SourceOrchestrator {
  const { web, academic } = config.search;

  const pages = new PageFetcher({
    userAgent: config.extraction.userAgent,
    timeoutMs: config.extraction.timeoutMs,
    maxRetries: config.extraction.maxRetries,
    retryDelayMs: config.extraction.retryDelayMs,
    maxTokensPerDocument: config.extraction.maxTokensPerDocument,
    fetch: deps.fetch,
    sleep: deps.sleep,
  });

  const webFetcher = new WebFetcher({
    provider: deps.webProvider,
    pages,
    gate: pLimit(web.concurrency),
    maxRetries: web.maxRetries,
    backoffBaseMs: web.backoffBaseMs,
    filters: {
      count: web.resultsPerQuery,
      country: web.country,
      language: web.language,
      safesearch: web.safeSearch,
    },
    sleep: deps.sleep,
  });

  const academicFetcher = new AcademicFetcher({
    provider: deps.paperProvider,
    pages,
    gate: pLimit(ACADEMIC_GATE_CAPACITY),
    relevanceGate: deps.relevanceJudge
      ? new RelevanceGate(deps.relevanceJudge)
      : undefined,
    resultsPerQuery: academic.resultsPerQuery,
    maxAttempts: academic.maxAttempts,
    backoffBaseMs: academic.backoffBaseMs,
    minCitationCount: academic.minCitationCount,
    abstractMinLength: academic.abstractMinLength,
    sleep: deps.sleep,
  });

  return new SourceOrchestrator(webFetcher, academicFetcher);
}
