/** Scores this close to 1 are reported as exactly 1. */
const UNIT_EPSILON = 1e-9;

export function l2Norm(vector: ArrayLike<number>): number {
  let sumOfSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumOfSquares += vector[i] * vector[i];
  }
  return Math.sqrt(sumOfSquares);
}

export function isZeroVector(vector: ArrayLike<number>): boolean {
  for (let i = 0; i < vector.length; i++) {
    if (vector[i] !== 0) return false;
  }
  return true;
}

/**
 * Cosine of the angle between `a` and `b`, clamped to [0, 1].
 * A zero-norm operand scores 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  const score = dotProduct / magnitude;
  if (score >= 1 - UNIT_EPSILON) return 1;
  return score < 0 ? 0 : score;
}
