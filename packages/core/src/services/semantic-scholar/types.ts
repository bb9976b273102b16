/**
 * Type definitions for the Semantic Scholar graph API
 */

import { z } from "zod";

export const PAPER_FIELDS =
  "title,abstract,url,year,venue,authors,citationCount,openAccessPdf";

/**
 * One paper from /graph/v1/paper/search. The API sends null for
 * anything it does not know.
 */
export const PaperSchema = z.object({
  paperId: z.string().nullish(),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  url: z.string().nullish(),
  year: z.number().int().nullish(),
  venue: z.string().nullish(),
  citationCount: z.number().int().nullish(),
  authors: z
    .array(z.object({ name: z.string().nullish() }))
    .nullish(),
  openAccessPdf: z.object({ url: z.string().nullish() }).nullish(),
});

export const PaperSearchPayloadSchema = z.object({
  total: z.number().nullish(),
  data: z.array(PaperSchema).nullish(),
});

export type Paper = z.infer<typeof PaperSchema>;

export interface PaperSearchResponse {
  query: string;
  papers: Paper[];
}
