/**
 * Page fetcher
 *
 * Downloads one document and routes it to the content extractor.
 * Thrown failures (network errors, timeouts) get a fixed-pause retry;
 * a non-200 answer is final. Every failure degrades to "".
 */

import {
  extractText,
  PDF_CONTENT_TYPE,
  DOCX_CONTENT_TYPE,
} from "./content-extractor";
import { withRetry, type Sleep } from "../utils/retry";
import { createChildLogger } from "../utils/logger";
import { describeError } from "../utils/errors";

const log = createChildLogger({ component: "page-fetcher" });

export interface PageFetcherOptions {
  userAgent: string;
  timeoutMs: number; // Per attempt
  maxRetries: number; // Extra attempts after the first
  retryDelayMs: number; // Fixed pause between attempts
  maxTokensPerDocument: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
}

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

/**
 * Content type to extract with. A .pdf/.docx path wins over the header,
 * since many servers send those as application/octet-stream.
 */
export function resolveContentType(url: string, header: string): string {
  const lowerPath = urlPath(url).toLowerCase();
  if (lowerPath.endsWith(".pdf")) return PDF_CONTENT_TYPE;
  if (lowerPath.endsWith(".docx")) return DOCX_CONTENT_TYPE;
  return header.toLowerCase();
}

/**
 * Anything that turns a URL into normalized text ("" on failure)
 */
export interface TextFetcher {
  fetchText(url: string): Promise<string>;
}

export class PageFetcher implements TextFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: PageFetcherOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Fetch a URL and return its normalized text, or "" on any failure
   */
  async fetchText(url: string): Promise<string> {
    try {
      return await withRetry(() => this.fetchOnce(url), {
        maxAttempts: this.options.maxRetries + 1,
        baseDelayMs: this.options.retryDelayMs,
        strategy: "fixed",
        isRetryable: () => true,
        sleep: this.options.sleep,
      });
    } catch (error) {
      log.debug({ url, error: describeError(error) }, "Failed to fetch page");
      return "";
    }
  }

  private async fetchOnce(url: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.options.timeoutMs
    );

    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        redirect: "follow",
        headers: {
          "User-Agent": this.options.userAgent,
          Accept:
            "text/html,application/xhtml+xml,application/pdf,application/xml;q=0.9,*/*;q=0.8",
        },
      });

      if (response.status !== 200) {
        log.debug({ url, status: response.status }, "Non-200 page response");
        return "";
      }

      const contentType = resolveContentType(
        url,
        response.headers.get("content-type") ?? ""
      );
      const raw = new Uint8Array(await response.arrayBuffer());

      return await extractText(
        raw,
        contentType,
        this.options.maxTokensPerDocument
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
