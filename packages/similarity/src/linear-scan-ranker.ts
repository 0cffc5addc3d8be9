import { cosineSimilarity } from "@docseek/embeddings";
import { InputError } from "@docseek/errors";
import type { Chunk, RankParams, RankedResult } from "@docseek/types";
import type { ISimilarityRanker } from "./ranker.interface.js";
import { toConfidence } from "./confidence.js";

interface Scored {
  chunk: Chunk;
  score: number;
}

function compareScored(a: Scored, b: Scored): number {
  return (
    b.score - a.score ||
    a.chunk.pageIndex - b.chunk.pageIndex ||
    a.chunk.sequence - b.chunk.sequence
  );
}

/** Exact cosine similarity against every candidate. */
export class LinearScanRanker implements ISimilarityRanker {
  readonly name = "linear";

  rank(params: RankParams): RankedResult[] {
    const { queryVector, candidates, k, minScore } = params;

    if (!Number.isInteger(k) || k < 1) {
      throw new InputError(`k must be a positive integer, got ${k}`, { details: { k } });
    }
    if (!Number.isFinite(minScore) || minScore < -1 || minScore > 1) {
      throw new InputError(`minScore must be within [-1, 1], got ${minScore}`, {
        details: { minScore },
      });
    }

    const scored: Scored[] = [];
    for (const candidate of candidates) {
      if (candidate.vector.length !== queryVector.length) {
        throw new InputError(
          `Dimension mismatch: query has ${queryVector.length}, chunk ${candidate.chunk.id} has ${candidate.vector.length}`,
          { details: { chunkId: candidate.chunk.id } },
        );
      }
      const score = cosineSimilarity(queryVector, candidate.vector);
      if (score >= minScore) {
        scored.push({ chunk: candidate.chunk, score });
      }
    }

    return scored
      .sort(compareScored)
      .slice(0, k)
      .map((item, i) => ({
        rank: i + 1,
        chunk: item.chunk,
        score: item.score,
        confidence: toConfidence(item.score),
      }));
  }
}
