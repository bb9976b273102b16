/**
 * Vector similarity helpers for sparse term-weight vectors
 */

export type SparseVector = Map<number, number>;

/**
 * Cosine similarity between two sparse vectors
 * Returns 0 when either vector has no weight.
 */
export function cosineSimilarity(vecA: SparseVector, vecB: SparseVector): number {
  const [small, large] = vecA.size <= vecB.size ? [vecA, vecB] : [vecB, vecA];

  let dotProduct = 0;
  for (const [index, weight] of small) {
    const other = large.get(index);
    if (other !== undefined) {
      dotProduct += weight * other;
    }
  }

  const magnitude = norm(vecA) * norm(vecB);
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

function norm(vec: SparseVector): number {
  let sum = 0;
  for (const weight of vec.values()) {
    sum += weight * weight;
  }
  return Math.sqrt(sum);
}

/**
 * Calculate similarity matrix for a list of vectors
 * Returns a 2D array where matrix[i][j] is the similarity between items i and j
 */
export function calculateSimilarityMatrix(vectors: SparseVector[]): number[][] {
  const n = vectors.length;
  const matrix: number[][] = Array.from({ length: n }, () =>
    new Array<number>(n).fill(0)
  );

  for (let i = 0; i < n; i++) {
    matrix[i][i] = 1;
    for (let j = i + 1; j < n; j++) {
      const similarity = cosineSimilarity(vectors[i], vectors[j]);
      matrix[i][j] = similarity;
      matrix[j][i] = similarity; // Symmetric
    }
  }

  return matrix;
}
