/**
 * Research Engine service
 *
 * Coordinates a research run:
 * 1. Generate the query set (via LLM provider)
 * 2. Fan out across web and academic sources
 * 3. Refine: truncation, quality gate, semantic dedup
 * 4. Synthesize the report (via LLM provider)
 */

export { executeResearch } from "./orchestrator";
export {
  SourceOrchestrator,
  createSourceOrchestrator,
  ACADEMIC_GATE_CAPACITY,
} from "./source-orchestrator";
export type {
  WebSource,
  AcademicSource,
  SourceDependencies,
} from "./source-orchestrator";
export { refineRecords } from "./refinement";
export type { RefinementOptions } from "./refinement";
export * from "./config";
export type {
  ResearchOptions,
  ResearchRunResult,
  ResearchStage,
  ResearchStatus,
  EvidenceSource,
} from "./types";
