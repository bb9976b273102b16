/**
 * EvidenceRecord data model
 *
 * A single retrieved unit of evidence. Created by a fetcher once a non-empty
 * body has been extracted, narrowed by the quality/citation/relevance gates,
 * and handed to deduplication and synthesis.
 */

export type SourceKind = "web" | "academic";

export const DEFAULT_TITLE = "No Title";
export const ABSTRACT_PLACEHOLDER = "Abstract not available.";

/**
 * Metadata returned with a web search hit
 */
export interface WebMetadata {
  description?: string; // Search engine snippet
}

/**
 * Metadata returned with an academic paper
 */
export interface AcademicMetadata {
  year?: number;
  venue?: string; // Journal or conference
  citations: number; // 0 when the source omits it
  authors: string[];
  hasOpenAccess: boolean;
}

interface RecordBase {
  title: string; // Never empty (defaults to DEFAULT_TITLE)
  body: string; // Normalized text, rewritten by refinement
  url: string; // May be empty for abstract-only papers
  referenceNumber?: number; // Assigned at synthesis time only
}

export interface WebRecord extends RecordBase {
  readonly sourceKind: "web";
  metadata: WebMetadata;
}

export interface AcademicRecord extends RecordBase {
  readonly sourceKind: "academic";
  metadata: AcademicMetadata;
  abstract?: string; // Kept even when body holds fetched full text
}

export type EvidenceRecord = WebRecord | AcademicRecord;

/**
 * Payload sent to synthesis (body shortened for the prompt)
 */
export interface EvidencePayload {
  title: string;
  url: string;
  body: string;
  sourceKind: SourceKind;
  metadata: WebMetadata | AcademicMetadata;
  abstract?: string;
}

export const PAYLOAD_BODY_LIMIT = 2000;

export function createWebRecord(fields: {
  title?: string;
  body: string;
  url: string;
  description?: string;
}): WebRecord {
  return {
    sourceKind: "web",
    title: fields.title || DEFAULT_TITLE,
    body: fields.body,
    url: fields.url,
    metadata: { description: fields.description },
  };
}

export function createAcademicRecord(fields: {
  title?: string;
  body: string;
  url?: string;
  abstract?: string;
  metadata: Omit<AcademicMetadata, "citations"> & { citations?: number };
}): AcademicRecord {
  return {
    sourceKind: "academic",
    title: fields.title || DEFAULT_TITLE,
    body: fields.body,
    url: fields.url ?? "",
    abstract: fields.abstract,
    metadata: {
      ...fields.metadata,
      citations: fields.metadata.citations ?? 0,
    },
  };
}

export function toPayload(record: EvidenceRecord): EvidencePayload {
  return {
    title: record.title,
    url: record.url,
    body: record.body.slice(0, PAYLOAD_BODY_LIMIT),
    sourceKind: record.sourceKind,
    metadata: record.metadata,
    abstract: record.sourceKind === "academic" ? record.abstract : undefined,
  };
}
