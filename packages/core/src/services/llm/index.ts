/**
 * LLM Provider implementations
 */

export { OpenAIProvider } from "./openai-provider";
export { normalizeQuerySet, fallbackQuerySet } from "./query-set";
export {
  assignReferenceNumbers,
  formatSourceList,
  formatPayload,
} from "./synthesis";
export { renderPrompt } from "./prompts";
export type { PromptConfig, ModelSettings } from "./prompts";
export type { LLMProvider } from "../../interfaces/llm-provider";
