/**
 * Refinement stage
 *
 * Pool → truncation → quality gate → semantic dedup. Kept records get the
 * truncated text written back as their body.
 */

import type { EvidenceRecord } from "../../models/evidence-record";
import { truncateToTokens } from "../../utils/token-estimation";
import { semanticDedup } from "../../utils/deduplication";
import { isQualityText } from "../filters/quality-gate";
import type { DeduplicationConfig } from "./config";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "refinement" });

export interface RefinementOptions {
  maxTokensPerDocument: number;
  deduplication: DeduplicationConfig;
}

export function refineRecords(
  records: EvidenceRecord[],
  options: RefinementOptions
): EvidenceRecord[] {
  const candidates: Array<{ record: EvidenceRecord; body: string }> = [];

  for (const record of records) {
    const body = truncateToTokens(record.body, options.maxTokensPerDocument);
    if (isQualityText(body, record.sourceKind)) {
      candidates.push({ record, body });
    }
  }

  if (candidates.length === 0) {
    log.info({ pooled: records.length }, "No records passed the quality gate");
    return [];
  }

  const { maxKeep, similarityThreshold, maxFeatures } = options.deduplication;
  const keep = semanticDedup(
    candidates.map((candidate) => candidate.body),
    maxKeep,
    { similarityThreshold, maxFeatures }
  );

  const refined = keep.map((index) => {
    const { record, body } = candidates[index];
    record.body = body;
    return record;
  });

  log.info(
    {
      pooled: records.length,
      quality: candidates.length,
      kept: refined.length,
    },
    "Refinement complete"
  );
  return refined;
}
