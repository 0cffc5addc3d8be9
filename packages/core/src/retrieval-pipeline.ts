import type { EmbeddingEngine } from "@docseek/embeddings";
import type { ISimilarityRanker } from "@docseek/similarity";
import type { ContentCacheValue, RankCandidate, RankedResult } from "@docseek/types";
import { inStage } from "./stage-error.js";

export interface RetrievalDependencies {
  engine: EmbeddingEngine;
  ranker: ISimilarityRanker;
}

export interface RetrievalRequest {
  documentId: string;
  /** Already normalised. */
  query: string;
  k: number;
  minScore: number;
  content: ContentCacheValue;
}

/**
 * Retrieval pipeline: Query -> Embed -> Rank against the cached matrix.
 * A document without chunks answers with no results and no embedding call.
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<RankedResult[]> {
  const { documentId, content } = request;
  if (content.chunks.length === 0) return [];

  const queryVector = await inStage({ operation: "query", documentId, stage: "embed" }, () =>
    deps.engine.embedQuery(request.query),
  );

  const candidates: RankCandidate[] = [];
  content.chunks.forEach((chunk, i) => {
    const vector = content.embeddings[i];
    if (vector) candidates.push({ chunk, vector });
  });

  return inStage({ operation: "query", documentId, stage: "rank" }, () =>
    deps.ranker.rank({ queryVector, candidates, k: request.k, minScore: request.minScore }),
  );
}
