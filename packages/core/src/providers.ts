/**
 * Provider Factory Functions
 *
 * Centralized provider creation from configuration and credentials.
 */

import type { LLMProvider } from "./interfaces/llm-provider";
import type {
  PaperSearchProvider,
  SearchProvider,
} from "./interfaces/search-provider";
import { OpenAIProvider } from "./services/llm/openai-provider";
import { createBraveSearchProvider } from "./services/search/brave-provider";
import { createSemanticScholarProvider } from "./services/search/semantic-scholar-provider";
import type {
  Credentials,
  ResearchConfig,
} from "./services/research-engine/config";

/**
 * Create an LLM provider from configuration
 */
export function createLLMProvider(
  config: ResearchConfig,
  credentials: Credentials
): LLMProvider {
  switch (config.llm.provider) {
    case "openai":
      return new OpenAIProvider(credentials.openaiApiKey, config.llm.models);
  }
}

/**
 * Create a web search provider from configuration
 */
export function createSearchProvider(
  config: ResearchConfig,
  credentials: Credentials
): SearchProvider {
  switch (config.search.web.provider) {
    case "brave":
      return createBraveSearchProvider(credentials.braveSearchApiKey);
  }
}

/**
 * Create an academic search provider from configuration
 */
export function createPaperSearchProvider(
  config: ResearchConfig,
  credentials: Credentials
): PaperSearchProvider {
  switch (config.search.academic.provider) {
    case "semantic-scholar":
      return createSemanticScholarProvider(credentials.semanticScholarApiKey);
  }
}

/**
 * Convenience function to create every provider at once
 */
export function createProviders(
  config: ResearchConfig,
  credentials: Credentials
): {
  llm: LLMProvider;
  search: SearchProvider;
  papers: PaperSearchProvider;
} {
  return {
    llm: createLLMProvider(config, credentials),
    search: createSearchProvider(config, credentials),
    papers: createPaperSearchProvider(config, credentials),
  };
}
