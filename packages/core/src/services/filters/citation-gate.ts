/**
 * Citation gate
 */

import type { EvidenceRecord } from "../../models/evidence-record";

export const DEFAULT_MIN_CITATION_COUNT = 3;

/**
 * Academic records under the threshold are rejected; web records always pass.
 * Citations absent from the source were already normalized to 0.
 */
export function passesCitationGate(
  record: EvidenceRecord,
  minCitationCount: number = DEFAULT_MIN_CITATION_COUNT
): boolean {
  if (record.sourceKind !== "academic") {
    return true;
  }
  return record.metadata.citations >= minCitationCount;
}
