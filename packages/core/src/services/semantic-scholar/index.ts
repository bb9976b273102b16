/**
 * Semantic Scholar academic graph service
 */

export { SemanticScholarClient } from "./client";
export type { SemanticScholarClientOptions } from "./client";
export { PAPER_FIELDS } from "./types";
export type { Paper, PaperSearchResponse } from "./types";
