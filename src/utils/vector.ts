/**
 * Vector math for embedding similarity
 */

/**
 * Cosine similarity of two equal-length vectors.
 *
 * A zero vector has no direction; its similarity to anything is 0.
 *
 * @throws {RangeError} If the vectors differ in length
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(
      `Cannot compare vectors of different length (${a.length} vs ${b.length})`,
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
