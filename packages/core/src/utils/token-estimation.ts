/**
 * Token estimation utilities
 *
 * These are approximate estimates, not a real tokenizer: a fixed ratio of
 * 4 characters per token is used for every budget in the pipeline.
 */

export const EST_CHARS_PER_TOKEN = 4;

/**
 * Estimate token count from text (integer division by the fixed ratio)
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.floor(text.length / EST_CHARS_PER_TOKEN);
}

/**
 * Cut text to a token budget. Hard character cut, not word-boundary aware.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (estimateTokens(text) > maxTokens) {
    return text.slice(0, maxTokens * EST_CHARS_PER_TOKEN);
  }
  return text;
}
