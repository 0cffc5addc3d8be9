import type { Chunk } from "./chunk.js";
import type { RankedResult } from "./query.js";

export interface StoreKey {
  partition: string;
  key: string;
}

export interface CacheEntry<T> {
  key: string;
  version: string;
  createdAt: string;
  value: T;
}

export interface ContentCacheValue {
  documentId: string;
  fingerprint: string;
  pageCount: number;
  chunks: Chunk[];
  /** Parallel to `chunks`: embeddings[i] belongs to chunks[i]. */
  embeddings: number[][];
  model: string;
  dimensions: number;
  skippedCount: number;
}

export interface QueryCacheValue {
  fingerprint: string;
  query: string;
  k: number;
  minScore: number;
  results: RankedResult[];
}
