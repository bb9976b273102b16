/**
 * Type definitions for research engine
 */

import type { LLMProvider, SynthesizedReport } from "../../interfaces/llm-provider";
import type { EvidenceRecord } from "../../models/evidence-record";
import type { QueryCounts, QuerySet } from "../../models/query-set";
import type { ResearchConfig } from "./config";

/**
 * Pipeline stages, in execution order
 */
export type ResearchStage =
  | "query-generation"
  | "retrieval"
  | "refinement"
  | "synthesis";

export type ResearchStatus = "completed" | "cancelled" | "failed";

/**
 * Anything that turns a query set into pooled evidence
 */
export interface EvidenceSource {
  searchAll(querySet: QuerySet, subject?: string): Promise<EvidenceRecord[]>;
}

/**
 * Research execution options
 */
export interface ResearchOptions {
  // === Provider Injection ===
  llmProvider: LLMProvider;
  sources: EvidenceSource;

  // === Query Generation Settings ===
  counts?: Partial<QueryCounts>; // default: research.generalQueries/academicQueries

  // === Stop signal, checked between stages ===
  signal?: AbortSignal;

  // === Full Config Override ===
  config?: ResearchConfig; // default: getConfig()
}

/**
 * Research execution result
 */
export interface ResearchRunResult {
  status: ResearchStatus;
  subject: string;
  stage?: ResearchStage; // Stage that was stopped or failed

  querySet?: QuerySet;
  records: EvidenceRecord[];
  report?: SynthesizedReport;

  // Errors
  error?: string;

  // Timing
  startedAt: number;
  completedAt: number;
  durationMs: number;
}
