export type CompatibilityCategory = 'Very Good' | 'Good' | 'Neutral' | 'Bad' | 'Very Bad';

/**
 * Lower bounds, checked in order. Anything below the last bound is `Very Bad`.
 */
const CATEGORY_THRESHOLDS: ReadonlyArray<[number, CompatibilityCategory]> = [
  [0.8, 'Very Good'],
  [0.6, 'Good'],
  [0.4, 'Neutral'],
  [0.2, 'Bad'],
];

/**
 * Cosine similarity of two equal-length vectors. A zero vector has no direction,
 * so its similarity to anything is 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
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
  return Math.min(1, Math.max(-1, dot / Math.sqrt(normA * normB)));
}

/**
 * Maps cosine similarity from [-1, 1] onto [0, 1].
 */
export function compatibilityScore(face: ArrayLike<number>, jewelry: ArrayLike<number>): number {
  return (cosineSimilarity(face, jewelry) + 1) / 2;
}

export function categorize(score: number): CompatibilityCategory {
  for (const [bound, category] of CATEGORY_THRESHOLDS) {
    if (score >= bound) {
      return category;
    }
  }
  return 'Very Bad';
}

/**
 * Names of the `k` highest-valued entries, highest first. Ties keep catalogue order.
 */
export function topKByValue(names: readonly string[], values: ArrayLike<number>, k: number): string[] {
  if (names.length !== values.length) {
    throw new Error(`Expected ${names.length} values, got ${values.length}`);
  }
  return names
    .map((name, index) => ({ name, index, value: values[index] }))
    .sort((x, y) => y.value - x.value || x.index - y.index)
    .slice(0, Math.max(0, k))
    .map(({ name }) => name);
}
