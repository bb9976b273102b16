/**
 * Search providers and the per-query fetchers built on them
 */

export {
  BraveSearchProvider,
  createBraveSearchProvider,
} from "./brave-provider";
export {
  SemanticScholarProvider,
  createSemanticScholarProvider,
} from "./semantic-scholar-provider";
export { WebFetcher } from "./web-fetcher";
export type { WebFetcherOptions } from "./web-fetcher";
export { AcademicFetcher } from "./academic-fetcher";
export type { AcademicFetcherOptions } from "./academic-fetcher";
export type {
  SearchProvider,
  PaperSearchProvider,
} from "../../interfaces/search-provider";
