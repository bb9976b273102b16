/**
 * Semantic deduplication
 *
 * TF-IDF vectors + all-pairs cosine similarity, followed by a greedy pass in
 * input order: the first text of a similarity cluster survives, later members
 * are dropped regardless of length or quality.
 */

import { readFileSync } from "node:fs";
import {
  calculateSimilarityMatrix,
  type SparseVector,
} from "./similarity";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;
export const DEFAULT_MAX_FEATURES = 5000;
export const DEFAULT_MAX_KEEP = 100;

export interface DedupOptions {
  similarityThreshold?: number; // Strictly greater than this marks a duplicate
  maxFeatures?: number; // Vocabulary bound (most frequent terms)
}

function loadStopWords(): Set<string> {
  const raw = readFileSync(
    new URL("../data/stopwords.json", import.meta.url),
    "utf8"
  );
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error("stopwords.json must contain an array of words");
  }
  return new Set(parsed.filter((w): w is string => typeof w === "string"));
}

const STOP_WORDS = loadStopWords();

/**
 * Lowercase, split into runs of two or more word characters, drop stop words
 */
export function tokenize(text: string): string[] {
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
  return tokens.filter((token) => !STOP_WORDS.has(token));
}

/**
 * Build L2-normalized TF-IDF vectors (smooth idf) for every text.
 * Returns null when the corpus yields an empty vocabulary.
 */
export function buildTfidfVectors(
  texts: string[],
  maxFeatures: number = DEFAULT_MAX_FEATURES
): SparseVector[] | null {
  const documents = texts.map(tokenize);

  const totalCounts = new Map<string, number>();
  const documentFrequency = new Map<string, number>();
  for (const tokens of documents) {
    for (const token of tokens) {
      totalCounts.set(token, (totalCounts.get(token) ?? 0) + 1);
    }
    for (const token of new Set(tokens)) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
  }

  if (totalCounts.size === 0) {
    return null;
  }

  const n = documents.length;
  const vocabulary = new Map<string, number>();
  const idf: number[] = [];
  [...totalCounts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, maxFeatures)
    .forEach(([term], index) => {
      vocabulary.set(term, index);
      idf.push(Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);
    });

  return documents.map((tokens) => {
    const vector: SparseVector = new Map();
    for (const token of tokens) {
      const index = vocabulary.get(token);
      if (index !== undefined) {
        vector.set(index, (vector.get(index) ?? 0) + 1);
      }
    }

    let sumSquares = 0;
    for (const [index, count] of vector) {
      const weight = count * idf[index];
      vector.set(index, weight);
      sumSquares += weight * weight;
    }

    const length = Math.sqrt(sumSquares);
    if (length > 0) {
      for (const [index, weight] of vector) {
        vector.set(index, weight / length);
      }
    }
    return vector;
  });
}

/**
 * Return the indices of the texts to keep, in ascending order.
 */
export function semanticDedup(
  texts: string[],
  maxKeep: number = DEFAULT_MAX_KEEP,
  options: DedupOptions = {}
): number[] {
  if (texts.length === 0) {
    return [];
  }
  if (texts.length === 1) {
    return [0];
  }

  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const vectors = buildTfidfVectors(texts, options.maxFeatures);

  if (!vectors) {
    return Array.from({ length: Math.min(texts.length, maxKeep) }, (_, i) => i);
  }

  const similarity = calculateSimilarityMatrix(vectors);
  const keep: number[] = [];
  const covered = new Set<number>();

  for (let i = 0; i < texts.length; i++) {
    if (covered.has(i)) {
      continue;
    }

    keep.push(i);
    covered.add(i);

    if (keep.length >= maxKeep) {
      break;
    }

    for (let j = i + 1; j < texts.length; j++) {
      if (!covered.has(j) && similarity[i][j] > threshold) {
        covered.add(j);
      }
    }
  }

  return keep;
}
