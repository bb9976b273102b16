/**
 * Provider interfaces for dependency injection
 */

export type { LLMProvider, SynthesizedReport } from "./llm-provider";

export type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  SearchResponse,
  PaperSearchProvider,
  PaperResultItem,
} from "./search-provider";
