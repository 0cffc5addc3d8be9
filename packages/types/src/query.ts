import type { Chunk } from "./chunk.js";

export interface QueryOptions {
  k?: number;
  minScore?: number;
}

export interface RankedResult {
  /** 1-based position in the result list. */
  rank: number;
  chunk: Chunk;
  /** Cosine similarity in [-1, 1]. */
  score: number;
  /** Percentage in [0, 100] derived from the score alone. */
  confidence: number;
}

export interface RankCandidate {
  chunk: Chunk;
  vector: readonly number[];
}

export interface RankParams {
  queryVector: readonly number[];
  candidates: readonly RankCandidate[];
  k: number;
  minScore: number;
}
