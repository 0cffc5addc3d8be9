/** Bump when the shape of any persisted entry changes. */
export const CACHE_SCHEMA_VERSION = 1;

export interface CacheVersionParts {
  provider: string;
  model: string;
  chunkerDigest: string;
}

/** `<schema>|<provider>:<model>|<chunker digest>`; entries written under another tag are misses. */
export function cacheVersion(parts: CacheVersionParts): string {
  return `${CACHE_SCHEMA_VERSION}|${parts.provider}:${parts.model}|${parts.chunkerDigest}`;
}

/** Recursively freeze a value so cached copies cannot be mutated by callers. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
