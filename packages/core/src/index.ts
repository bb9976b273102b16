/**
 * Core package entry point
 *
 * Exports the retrieval pipeline, its models, providers and utilities.
 */

// Models
export {
  DEFAULT_TITLE,
  ABSTRACT_PLACEHOLDER,
  PAYLOAD_BODY_LIMIT,
  createWebRecord,
  createAcademicRecord,
  toPayload,
} from "./models/evidence-record";
export type {
  SourceKind,
  WebMetadata,
  AcademicMetadata,
  WebRecord,
  AcademicRecord,
  EvidenceRecord,
  EvidencePayload,
} from "./models/evidence-record";
export type { QuerySet, QueryCounts } from "./models/query-set";

// Interfaces
export type * from "./interfaces";

// Providers
export {
  createLLMProvider,
  createSearchProvider,
  createPaperSearchProvider,
  createProviders,
} from "./providers";

// Services
export * from "./services/research-engine";
export * from "./services/llm";
export * from "./services/search";
export * from "./services/filters";
export { BraveSearchClient } from "./services/brave-search";
export { SemanticScholarClient } from "./services/semantic-scholar";
export {
  compressText,
  extractText,
  detectDocumentKind,
  looksLikeMarkup,
} from "./services/content-extractor";
export { pdfToText, docxToText } from "./services/document-decoders";
export { PageFetcher, resolveContentType } from "./services/page-fetcher";
export type { PageFetcherOptions, TextFetcher } from "./services/page-fetcher";
export { generateBibliometrics } from "./services/bibliometrics";

// Utils
export { logger, createChildLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export {
  HttpStatusError,
  ConfigurationError,
  isRateLimitError,
  isTransientError,
  describeError,
} from "./utils/errors";
export { withRetry, backoffDelay } from "./utils/retry";
export type { RetryOptions, BackoffStrategy, Sleep } from "./utils/retry";
export { semanticDedup, tokenize } from "./utils/deduplication";
export { estimateTokens, truncateToTokens } from "./utils/token-estimation";
