/**
 * Cosine distance with the conventions shared by every example index:
 * the result is always in [0, 2], and degenerate inputs score as farthest.
 */

export const MAX_COSINE_DISTANCE = 2.0;

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return MAX_COSINE_DISTANCE;
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
    return MAX_COSINE_DISTANCE;
  }

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return 1 - Math.min(1, Math.max(-1, similarity));
}

/**
 * Map a distance reported by a database back into [0, 2]. Zero-norm rows come
 * back as NaN (or NULL) and rank as farthest.
 */
export function boundedDistance(raw: number | null): number {
  if (raw === null || Number.isNaN(raw)) {
    return MAX_COSINE_DISTANCE;
  }
  return Math.min(MAX_COSINE_DISTANCE, Math.max(0, raw));
}
