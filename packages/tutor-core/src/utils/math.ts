/**
 * Vector math used by the semantic cache and the local vector store
 */

/**
 * Calculate cosine similarity between two vectors
 *
 * Produces a value between -1 and 1, where 1 means the vectors point in
 * the same direction and 0 means they are orthogonal.
 *
 * @returns Similarity score, or 0 if vectors have different lengths or zero magnitudes
 *
 * @example
 * ```typescript
 * const similarity = cosineSimilarity([1, 2, 3], [4, 5, 6]);
 * console.log(similarity); // ~0.974
 * ```
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dotProduct += av * bv;
    normA += av * av;
    normB += bv * bv;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / Math.sqrt(normA * normB);
}

/**
 * Calculate magnitude (L2 norm) of a vector
 */
export function magnitude(vec: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < vec.length; i++) {
    const v = vec[i] ?? 0;
    sum += v * v;
  }
  return Math.sqrt(sum);
}

/**
 * Normalize a vector to unit length
 *
 * @returns Normalized vector, or a copy of the input if its magnitude is 0
 */
export function normalize(vec: readonly number[]): number[] {
  const mag = magnitude(vec);
  if (mag === 0) {
    return [...vec];
  }
  return vec.map(v => v / mag);
}
