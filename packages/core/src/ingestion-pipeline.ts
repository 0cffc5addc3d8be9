import type { IChunkBuilder } from "@docseek/chunker";
import { chunkId } from "@docseek/chunker";
import type { EmbeddingEngine } from "@docseek/embeddings";
import { EmbeddingError, IngestCancelledError } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type {
  Chunk,
  ChunkBuildReport,
  ContentCacheValue,
  IngestProgress,
  RawPage,
} from "@docseek/types";
import { ProgressTracker } from "./progress-tracker.js";
import { inStage } from "./stage-error.js";

export interface IngestionDependencies {
  chunkBuilder: IChunkBuilder;
  engine: EmbeddingEngine;
  logger?: Logger;
  now?: () => number;
}

export interface IngestionInput {
  documentId: string;
  fingerprint: string;
  /** Valid pages in page order. */
  pages: readonly RawPage[];
  signal?: AbortSignal;
  onProgress?: (progress: IngestProgress) => void;
}

export interface IngestionOutput {
  value: ContentCacheValue;
  report: ChunkBuildReport;
  progress: IngestProgress;
}

function throwIfCancelled(documentId: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new IngestCancelledError(documentId, { cause: signal.reason });
  }
}

/** Sequences stay contiguous per page once skipped chunks are removed. */
function resequence(chunks: readonly Chunk[], fingerprint: string): Chunk[] {
  const next = new Map<number, number>();
  return chunks.map((chunk) => {
    const sequence = next.get(chunk.pageIndex) ?? 0;
    next.set(chunk.pageIndex, sequence + 1);
    if (sequence === chunk.sequence) return chunk;
    return { ...chunk, sequence, id: chunkId(fingerprint, chunk.pageIndex, sequence) };
  });
}

/**
 * Ingestion pipeline: Chunk -> Embed.
 *
 * Produces the content entry for one fingerprint without committing it; the
 * caller owns the commit so that nothing is written for a cancelled or failed
 * run. Chunks whose embedding fails are dropped and counted as skipped.
 */
export async function ingest(
  input: IngestionInput,
  deps: IngestionDependencies,
): Promise<IngestionOutput> {
  const { documentId, fingerprint, pages, signal } = input;
  const logger = deps.logger;

  const tracker = new ProgressTracker({
    documentId,
    pagesTotal: pages.length,
    emit: (progress) => input.onProgress?.(progress),
    now: deps.now,
  });
  tracker.start();
  throwIfCancelled(documentId, signal);

  // Phase 1: Chunk
  const { chunks, report } = await inStage({ operation: "ingest", documentId, stage: "chunk" }, () =>
    deps.chunkBuilder.buildWithReport(pages, fingerprint),
  );
  logger?.debug({ documentId, ...report }, "chunks built");

  const remaining = new Map<number, number>();
  for (const chunk of chunks) {
    remaining.set(chunk.pageIndex, (remaining.get(chunk.pageIndex) ?? 0) + 1);
  }
  tracker.advance(pages.length - remaining.size);
  throwIfCancelled(documentId, signal);

  // Phase 2: Embed, page progress as batches settle
  const { vectors, failedIndices } = await inStage(
    { operation: "ingest", documentId, stage: "embed" },
    () =>
      deps.engine.embedIsolated(
        chunks.map((chunk) => chunk.content),
        {
          signal,
          onBatchSettled: (indices) => {
            let finished = 0;
            for (const index of indices) {
              const chunk = chunks[index];
              if (!chunk) continue;
              const left = (remaining.get(chunk.pageIndex) ?? 0) - 1;
              remaining.set(chunk.pageIndex, left);
              if (left === 0) finished++;
            }
            tracker.advance(finished);
          },
        },
      ),
  );
  throwIfCancelled(documentId, signal);

  if (chunks.length > 0 && failedIndices.length === chunks.length) {
    throw new EmbeddingError(`No chunk of document "${documentId}" could be embedded`, failedIndices, {
      details: { documentId, stage: "embed" },
    });
  }

  const kept: Chunk[] = [];
  const embeddings: number[][] = [];
  chunks.forEach((chunk, i) => {
    const vector = vectors[i];
    if (vector) {
      kept.push(chunk);
      embeddings.push(vector);
    }
  });

  if (failedIndices.length > 0) {
    logger?.warn(
      { documentId, skipped: failedIndices.length, total: chunks.length },
      "chunks skipped after embedding failures",
    );
  }

  return {
    value: {
      documentId,
      fingerprint,
      pageCount: pages.length,
      chunks: resequence(kept, fingerprint),
      embeddings,
      model: deps.engine.model,
      dimensions: embeddings[0]?.length ?? deps.engine.dimensions ?? 0,
      skippedCount: failedIndices.length,
    },
    report,
    progress: tracker.snapshot(),
  };
}
