/**
 * Error types shared across the retrieval pipeline
 */

/**
 * A remote API answered with a non-success status
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, detail?: string) {
    super(
      `HTTP ${status} from ${url}${detail ? `: ${detail.slice(0, 200)}` : ""}`
    );
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

/**
 * Required configuration (usually a credential) is missing or invalid
 */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

/**
 * HTTP 429 from any source
 */
export function isRateLimitError(error: unknown): boolean {
  return error instanceof HttpStatusError && error.status === 429;
}

/**
 * Failures worth another attempt: throttling, server errors, timeouts and
 * network-level errors (fetch rejects those with a TypeError)
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  if (error instanceof Error) {
    return (
      error.name === "AbortError" ||
      error.name === "TimeoutError" ||
      error instanceof TypeError
    );
  }
  return false;
}

/**
 * Message of anything thrown, for log fields
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
