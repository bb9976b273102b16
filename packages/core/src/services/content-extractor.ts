/**
 * Content extraction service
 *
 * Turns fetched bytes into normalized plain text:
 * - PDF and DOCX go through the document decoders first
 * - Markup goes through a main-content pass (boilerplate stripped)
 * - Anything else is already plain text
 *
 * Output is always cut to a token budget (see utils/token-estimation).
 */

import * as cheerio from "cheerio";
import { pdfToText, docxToText } from "./document-decoders";
import { truncateToTokens } from "../utils/token-estimation";
import { createChildLogger } from "../utils/logger";
import { describeError } from "../utils/errors";

const log = createChildLogger({ component: "content-extractor" });

export const PDF_CONTENT_TYPE = "application/pdf";
export const DOCX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export type DocumentKind = "pdf" | "docx" | "html";

const MIN_INPUT_LENGTH = 10;
const MIN_MAIN_CONTENT_LENGTH = 100;

// Boilerplate removed before looking for the main content
const BOILERPLATE_SELECTORS =
  "script, style, noscript, nav, footer, header, aside, iframe, form, table";

const HTML_COMMENT_PATTERN = /<!--[\s\S]*?-->/g;

// Common content selectors (in priority order)
const CONTENT_SELECTORS = [
  "article",
  '[role="main"]',
  "main",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content",
];

/**
 * Classify a document from its content-type hint
 */
export function detectDocumentKind(contentTypeHint: string): DocumentKind {
  const hint = contentTypeHint.toLowerCase();
  if (hint.includes(PDF_CONTENT_TYPE)) return "pdf";
  if (hint.includes(DOCX_CONTENT_TYPE)) return "docx";
  return "html";
}

/**
 * Heuristic check for structural tags
 */
export function looksLikeMarkup(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    lower.includes("<html") || lower.includes("<body") || lower.includes("<div")
  );
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Extract main content from the page
 * Tries common content selectors, falls back to body
 */
function extractMainContent($: cheerio.CheerioAPI): string {
  $(BOILERPLATE_SELECTORS).remove();

  for (const selector of CONTENT_SELECTORS) {
    const content = normalizeWhitespace($(selector).first().text());
    if (content.length > MIN_MAIN_CONTENT_LENGTH) {
      return content;
    }
  }

  return normalizeWhitespace($("body").text());
}

/**
 * Strip markup boilerplate (when present) and cut to `maxTokens`
 */
export function compressText(text: string, maxTokens: number): string {
  if (!text || text.length < MIN_INPUT_LENGTH) {
    return "";
  }

  let content = text;
  if (looksLikeMarkup(text)) {
    let extracted = "";
    try {
      extracted = extractMainContent(
        cheerio.load(text.replace(HTML_COMMENT_PATTERN, ""))
      );
    } catch (error) {
      log.debug({ error: describeError(error) }, "Main content pass failed");
    }

    if (!extracted) {
      extracted = text.toLowerCase().includes("<html") ? "" : text;
    }
    content = extracted;
  }

  return truncateToTokens(content, maxTokens);
}

/**
 * Decode raw bytes by document kind and normalize to a token budget
 */
export async function extractText(
  raw: Uint8Array,
  contentTypeHint: string,
  maxTokens: number
): Promise<string> {
  const kind = detectDocumentKind(contentTypeHint);

  let text: string;
  switch (kind) {
    case "pdf":
      text = await pdfToText(raw);
      break;
    case "docx":
      text = await docxToText(raw);
      break;
    default:
      text = new TextDecoder("utf-8").decode(raw);
  }

  return compressText(text, maxTokens);
}
