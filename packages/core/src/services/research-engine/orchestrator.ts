/**
 * Research orchestrator
 *
 * Chains one research run:
 * 1. Generate the query set (LLM provider)
 * 2. Retrieve evidence from every source
 * 3. Refine (truncate, quality gate, dedup)
 * 4. Synthesize the report (LLM provider)
 *
 * The stop signal is checked between stages only; in-flight work is never
 * interrupted.
 */

import type { EvidenceRecord } from "../../models/evidence-record";
import type { QueryCounts, QuerySet } from "../../models/query-set";
import type { SynthesizedReport } from "../../interfaces/llm-provider";
import { getConfig } from "./config";
import { refineRecords } from "./refinement";
import type {
  ResearchOptions,
  ResearchRunResult,
  ResearchStage,
  ResearchStatus,
} from "./types";
import { describeError } from "../../utils/errors";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "research" });

/**
 * Execute one research run for a subject. Never rejects.
 */
export async function executeResearch(
  subject: string,
  options: ResearchOptions
): Promise<ResearchRunResult> {
  const startedAt = Date.now();
  const config = options.config ?? getConfig();
  const { llmProvider, sources, signal } = options;

  const counts: QueryCounts = {
    general: options.counts?.general ?? config.research.generalQueries,
    academic: options.counts?.academic ?? config.research.academicQueries,
  };

  let stage: ResearchStage = "query-generation";
  let querySet: QuerySet | undefined;
  let records: EvidenceRecord[] = [];

  const finish = (
    status: ResearchStatus,
    extra: { report?: SynthesizedReport; error?: string } = {}
  ): ResearchRunResult => {
    const completedAt = Date.now();
    return {
      status,
      subject,
      stage: status === "completed" ? undefined : stage,
      querySet,
      records,
      ...extra,
      startedAt,
      completedAt,
      durationMs: completedAt - startedAt,
    };
  };

  const stopRequested = (): boolean => {
    if (signal?.aborted) {
      log.warn({ subject, stage }, "Research stopped before stage");
      return true;
    }
    return false;
  };

  try {
    if (stopRequested()) return finish("cancelled");
    log.info({ subject, ...counts }, "Generating query set");
    querySet = await llmProvider.generateQuerySet(subject, counts);

    stage = "retrieval";
    if (stopRequested()) return finish("cancelled");
    records = await sources.searchAll(querySet, subject);

    stage = "refinement";
    if (stopRequested()) return finish("cancelled");
    records = refineRecords(records, {
      maxTokensPerDocument: config.extraction.maxTokensPerDocument,
      deduplication: config.deduplication,
    });

    stage = "synthesis";
    if (stopRequested()) return finish("cancelled");
    if (records.length === 0) {
      log.warn({ subject }, "No evidence survived refinement, skipping synthesis");
      return finish("completed", { report: { markdown: "", sourceCount: 0 } });
    }
    const report = await llmProvider.synthesizeReport(subject, records);

    log.info(
      { subject, sources: records.length, durationMs: Date.now() - startedAt },
      "Research complete"
    );
    return finish("completed", { report });
  } catch (error) {
    log.error({ subject, stage, error: describeError(error) }, "Research failed");
    return finish("failed", { error: describeError(error) });
  }
}
