/**
 * Retry-with-backoff wrapper
 *
 * Used by every remote call in the pipeline so the search clients and the
 * page fetcher share one retry policy implementation.
 */

export type BackoffStrategy = "exponential" | "fixed";

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxAttempts: number; // Total calls, including the first one
  baseDelayMs: number;
  strategy?: BackoffStrategy; // default: exponential
  isRetryable: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `retryIndex` (0 for the first retry)
 */
export function backoffDelay(
  strategy: BackoffStrategy,
  baseDelayMs: number,
  retryIndex: number
): number {
  if (strategy === "fixed") {
    return baseDelayMs;
  }
  return baseDelayMs * Math.pow(2, retryIndex);
}

/**
 * Run `operation` until it resolves, a non-retryable error is thrown, or the
 * attempt budget is spent. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const strategy = options.strategy ?? "exponential";
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const isLast = attempt >= maxAttempts - 1;
      if (isLast || !options.isRetryable(error)) {
        throw error;
      }

      const delay = backoffDelay(strategy, options.baseDelayMs, attempt);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
