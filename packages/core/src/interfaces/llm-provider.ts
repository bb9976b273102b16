/**
 * LLM Provider Interface
 *
 * Abstract interface for the large language model collaborator.
 * The retrieval core only needs the relevance judgment; query generation
 * and report synthesis sit on either side of it in the research pipeline.
 */

import type { QueryCounts, QuerySet } from "../models/query-set";
import type { EvidenceRecord } from "../models/evidence-record";
import type { RelevanceJudge } from "../services/filters/relevance-gate";

/**
 * Synthesized report
 */
export interface SynthesizedReport {
  markdown: string;
  sourceCount: number;
}

/**
 * LLM Provider interface
 * All LLM providers must implement these methods
 */
export interface LLMProvider extends RelevanceJudge {
  /**
   * Generate exactly `counts.general` web queries and `counts.academic`
   * academic queries for a subject
   */
  generateQuerySet(subject: string, counts: QueryCounts): Promise<QuerySet>;

  /**
   * Free-text answer to "is this paper relevant to the subject?"
   */
  generateRelevanceJudgment(
    subject: string,
    title: string,
    abstract: string
  ): Promise<string>;

  /**
   * Write the final report. Assigns referenceNumber 1..n on the records.
   */
  synthesizeReport(
    subject: string,
    records: EvidenceRecord[]
  ): Promise<SynthesizedReport>;

  /**
   * Get the provider name
   */
  getName(): string;
}
