/**
 * Query set parsing
 *
 * The model is asked for exact counts but does not always comply, so its
 * JSON is padded or truncated to the requested sizes. Output that is not
 * a JSON object falls back to generic subject queries.
 */

import type { QueryCounts, QuerySet } from "../../models/query-set";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "query-set" });

function stripCodeFences(text: string): string {
  return text.replace(/```json/g, "").replace(/```/g, "").trim();
}

function toQueryList(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => String(item));
}

function fitToCount(
  queries: string[],
  count: number,
  pad: (position: number) => string,
  kind: string
): string[] {
  if (queries.length > count) {
    return queries.slice(0, count);
  }
  if (queries.length < count) {
    log.warn(
      { kind, received: queries.length, expected: count },
      "Model returned too few queries, padding"
    );
  }
  const fitted = [...queries];
  while (fitted.length < count) {
    fitted.push(pad(fitted.length + 1));
  }
  return fitted;
}

/**
 * Generic queries used when the model output cannot be parsed
 */
export function fallbackQuerySet(
  subject: string,
  counts: QueryCounts
): QuerySet {
  return {
    general: Array.from({ length: counts.general }, (_, i) => `${subject} ${i + 1}`),
    academic: Array.from(
      { length: counts.academic },
      (_, i) => `${subject} research ${i + 1}`
    ),
  };
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(stripCodeFences(text));
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Turn raw model output into a query set of exactly the requested sizes
 */
export function normalizeQuerySet(
  raw: string,
  subject: string,
  counts: QueryCounts
): QuerySet {
  const data = parseObject(raw);
  if (!data) {
    log.error("Failed to parse query set JSON, using fallback queries");
    return fallbackQuerySet(subject, counts);
  }

  return {
    general: fitToCount(
      toQueryList(data.general),
      counts.general,
      (position) => `${subject} ${position}`,
      "general"
    ),
    academic: fitToCount(
      toQueryList(data.academic),
      counts.academic,
      (position) => `${subject} research paper ${position}`,
      "academic"
    ),
  };
}
