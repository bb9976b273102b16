/**
 * Bibliometrics report
 *
 * Plain-text summary of the final record set: counts per source kind and
 * one block per academic record. No filtering happens here.
 */

import { format } from "date-fns";
import type {
  AcademicRecord,
  EvidenceRecord,
} from "../models/evidence-record";

const RULE_WIDTH = 80;
const HEAVY_RULE = "=".repeat(RULE_WIDTH);
const LIGHT_RULE = "-".repeat(RULE_WIDTH);

function describeAcademic(record: AcademicRecord, position: number): string[] {
  const { metadata } = record;
  const lines = [
    "",
    `[${position}] ${record.title}`,
    `    URL: ${record.url}`,
    `    Venue: ${metadata.venue || "N/A"}`,
    `    Year: ${metadata.year ?? "N/A"}`,
    `    Citations: ${metadata.citations}`,
  ];
  if (metadata.authors.length > 0) {
    lines.push(`    Authors: ${metadata.authors.join(", ")}`);
  }
  return lines;
}

/**
 * Render the report for `records` as of `now`
 */
export function generateBibliometrics(
  records: EvidenceRecord[],
  now: Date = new Date()
): string {
  const academic = records.filter(
    (record): record is AcademicRecord => record.sourceKind === "academic"
  );
  const webCount = records.length - academic.length;

  const lines = [
    HEAVY_RULE,
    `BIBLIOMETRICS REPORT - ${format(now, "yyyy-MM-dd HH:mm:ss")}`,
    HEAVY_RULE,
    "",
    "SUMMARY STATISTICS",
    LIGHT_RULE,
    `Total Sources: ${records.length}`,
    `  - Web: ${webCount}`,
    `  - Academic: ${academic.length}`,
    "",
  ];

  if (academic.length > 0) {
    lines.push("ACADEMIC SOURCES", LIGHT_RULE);
    academic.forEach((record, index) => {
      lines.push(...describeAcademic(record, index + 1));
    });
  }

  lines.push("", HEAVY_RULE, "END OF REPORT", HEAVY_RULE);
  return lines.join("\n");
}
