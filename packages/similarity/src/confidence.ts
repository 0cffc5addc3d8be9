/** Percentage with one decimal; negative similarity maps to 0. */
export function toConfidence(score: number): number {
  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 1000) / 10;
}
