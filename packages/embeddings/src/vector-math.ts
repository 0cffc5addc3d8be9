export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/** Unit-length copy, or null when the vector is empty, zero or non-finite. */
export function l2Normalize(vector: readonly number[]): number[] | null {
  if (vector.length === 0 || !vector.every(Number.isFinite)) return null;
  const length = norm(vector);
  if (length === 0 || !Number.isFinite(length)) return null;
  return vector.map((value) => value / length);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) return 0;
  return Math.max(-1, Math.min(1, dot(a, b) / denominator));
}
