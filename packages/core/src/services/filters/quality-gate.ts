/**
 * Quality gate
 *
 * Pure predicate over a normalized body. Academic text only needs a minimum
 * length; web text also has to be free of promotional phrases.
 */

import type { SourceKind } from "../../models/evidence-record";

export const MIN_ACADEMIC_LENGTH = 100;
export const MIN_WEB_LENGTH = 500;

// Closed set, matched as lowercase substrings
export const HYPE_PATTERNS: readonly string[] = [
  "buy now",
  "order now",
  "click here",
  "call now",
  "add to cart",
  "sign up today",
  "subscribe now",
  "book now",
  "limited offer",
];

export function containsHype(text: string): boolean {
  const lower = text.toLowerCase();
  return HYPE_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Whether a body is worth keeping for the given source kind
 */
export function isQualityText(text: string, sourceKind: SourceKind): boolean {
  if (!text) {
    return false;
  }

  if (sourceKind === "academic") {
    return text.length >= MIN_ACADEMIC_LENGTH;
  }

  if (text.length < MIN_WEB_LENGTH) {
    return false;
  }
  return !containsHype(text);
}
