import { InputError } from "@docseek/errors";

/**
 * Canonical form used both as the query cache key and as the text that gets
 * embedded: NFKC, trimmed, whitespace collapsed, lowercased.
 */
export function normalizeQuery(query: unknown): string {
  if (typeof query !== "string") {
    throw new InputError("Query must be a string", { details: { received: typeof query } });
  }
  const normalized = query.normalize("NFKC").trim().replace(/\s+/g, " ").toLowerCase();
  if (normalized.length === 0) {
    throw new InputError("Query must not be empty");
  }
  return normalized;
}

export function validateK(k: number): number {
  if (!Number.isInteger(k) || k < 1) {
    throw new InputError(`k must be a positive integer, got ${k}`, { details: { k } });
  }
  return k;
}

export function validateMinScore(minScore: number): number {
  if (!Number.isFinite(minScore) || minScore < -1 || minScore > 1) {
    throw new InputError(`minScore must be within [-1, 1], got ${minScore}`, {
      details: { minScore },
    });
  }
  return minScore;
}
