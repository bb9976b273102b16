/**
 * Synthesis inputs
 *
 * Reference numbers are assigned here, in final record order, right before
 * the report prompt is built.
 */

import {
  toPayload,
  type EvidenceRecord,
} from "../../models/evidence-record";

export function assignReferenceNumbers(records: EvidenceRecord[]): void {
  records.forEach((record, index) => {
    record.referenceNumber = index + 1;
  });
}

/**
 * "1. Title  https://..." per line
 */
export function formatSourceList(records: EvidenceRecord[]): string {
  return records
    .map((record, index) => `${record.referenceNumber ?? index + 1}. ${record.title}  ${record.url}`)
    .join("\n");
}

export function formatPayload(records: EvidenceRecord[]): string {
  return JSON.stringify(records.map(toPayload), null, 2);
}
