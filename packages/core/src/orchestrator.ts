import type { ContentCache, QueryCache } from "@docseek/cache";
import type { IChunkBuilder } from "@docseek/chunker";
import { fingerprintPages, sortPages } from "@docseek/chunker";
import type { EmbeddingEngine } from "@docseek/embeddings";
import { DocumentNotIngestedError, IngestCancelledError, InputError } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type { ISimilarityRanker } from "@docseek/similarity";
import type {
  ContentCacheValue,
  DocumentState,
  IngestOptions,
  IngestProgress,
  IngestResult,
  ProgressObserver,
  QueryOptions,
  RankedResult,
  RawPage,
} from "@docseek/types";
import { ingest } from "./ingestion-pipeline.js";
import { ProgressTracker } from "./progress-tracker.js";
import { normalizeQuery, validateK, validateMinScore } from "./query-normalizer.js";
import { retrieve } from "./retrieval-pipeline.js";
import { inStage } from "./stage-error.js";

export interface RetrievalOrchestratorOptions {
  chunkBuilder: IChunkBuilder;
  engine: EmbeddingEngine;
  ranker: ISimilarityRanker;
  contentCache: ContentCache;
  queryCache: QueryCache;
  /** Used when a query does not pass its own `k` / `minScore`. */
  defaults: { k: number; minScore: number };
  logger?: Logger;
  now?: () => number;
}

/** What a finished ingest of one fingerprint yields, before any document id is registered. */
interface IngestOutcome {
  fingerprint: string;
  pageCount: number;
  chunkCount: number;
  skippedCount: number;
  model: string;
  dimensions: number;
  fromCache: boolean;
}

interface InFlightIngest {
  fingerprint: string;
  promise: Promise<IngestOutcome>;
  controller: AbortController;
  observers: Set<ProgressObserver>;
  waiters: number;
}

function toOutcome(value: ContentCacheValue, fromCache: boolean): IngestOutcome {
  return {
    fingerprint: value.fingerprint,
    pageCount: value.pageCount,
    chunkCount: value.chunks.length,
    skippedCount: value.skippedCount,
    model: value.model,
    dimensions: value.dimensions,
    fromCache,
  };
}

function copyResults(results: readonly RankedResult[]): RankedResult[] {
  return results.map((result) => ({ ...result, chunk: { ...result.chunk } }));
}

/**
 * Entry point for ingesting documents and answering queries against them.
 *
 * Concurrent ingests of the same content share one unit of work. A caller
 * that cancels only detaches itself; the shared work is aborted once every
 * caller waiting on it has cancelled. Nothing reaches the caches or the
 * registry unless the ingest completes.
 */
export class RetrievalOrchestrator {
  private readonly inFlight = new Map<string, InFlightIngest>();
  private readonly ingesting = new Map<string, number>();
  private readonly logger: Logger | undefined;
  private readonly now: () => number;

  constructor(private readonly options: RetrievalOrchestratorOptions) {
    this.logger = options.logger?.child({ component: "orchestrator" });
    this.now = options.now ?? Date.now;
  }

  async ingestDocument(
    documentId: string,
    pages: readonly RawPage[],
    options: IngestOptions = {},
  ): Promise<IngestResult> {
    if (typeof documentId !== "string" || documentId.length === 0) {
      throw new InputError("documentId must be a non-empty string");
    }
    if (!Array.isArray(pages)) {
      throw new InputError("pages must be an array", { details: { documentId } });
    }
    if (options.signal?.aborted) {
      throw new IngestCancelledError(documentId, { cause: options.signal.reason });
    }

    const startedAt = this.now();
    const validPages = sortPages(pages);
    if (validPages.length < pages.length) {
      this.logger?.warn(
        { documentId, skipped: pages.length - validPages.length },
        "malformed pages ignored",
      );
    }
    const fingerprint = fingerprintPages(validPages);

    this.ingesting.set(documentId, (this.ingesting.get(documentId) ?? 0) + 1);
    try {
      const flight = this.inFlight.get(fingerprint) ?? this.start(documentId, fingerprint, validPages);
      const outcome = await this.join(documentId, flight, options);
      await inStage({ operation: "ingest", documentId, stage: "commit" }, () =>
        this.register(documentId, outcome),
      );

      const result: IngestResult = {
        documentId,
        fingerprint,
        pageCount: outcome.pageCount,
        chunkCount: outcome.chunkCount,
        skippedCount: outcome.skippedCount,
        fromCache: outcome.fromCache,
        model: outcome.model,
        dimensions: outcome.dimensions,
        durationMs: this.now() - startedAt,
      };
      this.logger?.info(
        {
          documentId,
          fingerprint,
          chunkCount: result.chunkCount,
          skippedCount: result.skippedCount,
          fromCache: result.fromCache,
          durationMs: result.durationMs,
        },
        "document ingested",
      );
      return result;
    } finally {
      const count = (this.ingesting.get(documentId) ?? 1) - 1;
      if (count > 0) this.ingesting.set(documentId, count);
      else this.ingesting.delete(documentId);
    }
  }

  async answerQuery(
    documentId: string,
    queryText: string,
    options: QueryOptions = {},
  ): Promise<RankedResult[]> {
    const query = normalizeQuery(queryText);
    const k = validateK(options.k ?? this.options.defaults.k);
    const minScore = validateMinScore(options.minScore ?? this.options.defaults.minScore);

    const record = await inStage({ operation: "query", documentId, stage: "resolve" }, () =>
      this.options.contentCache.getDocument(documentId),
    );
    if (!record) throw new DocumentNotIngestedError(documentId);
    const { fingerprint } = record;

    const cached = await inStage({ operation: "query", documentId, stage: "lookup" }, () =>
      this.options.queryCache.get(fingerprint, query, k, minScore),
    );
    if (cached) {
      this.logger?.debug({ documentId, k, minScore }, "query cache hit");
      return copyResults(cached);
    }

    const content = await inStage({ operation: "query", documentId, stage: "lookup" }, () =>
      this.options.contentCache.get(fingerprint),
    );
    if (!content) {
      throw new DocumentNotIngestedError(documentId, { details: { fingerprint } });
    }

    const results = await retrieve(
      { documentId, query, k, minScore, content },
      { engine: this.options.engine, ranker: this.options.ranker },
    );
    await inStage({ operation: "query", documentId, stage: "commit" }, () =>
      this.options.queryCache.put(fingerprint, query, k, minScore, results),
    );
    this.logger?.debug({ documentId, k, minScore, results: results.length }, "query answered");
    return copyResults(results);
  }

  async getDocumentState(documentId: string): Promise<DocumentState> {
    if (this.ingesting.has(documentId)) return "ingesting";
    const record = await this.options.contentCache.getDocument(documentId);
    return record ? "ingested" : "uningested";
  }

  /**
   * Drops the document's registry record, then its content and queries
   * unless another document id holds the same content.
   */
  async invalidateDocument(documentId: string): Promise<boolean> {
    const record = await this.options.contentCache.getDocument(documentId);
    if (!record) return false;
    await this.options.contentCache.deleteDocument(documentId);
    const contentDropped = await this.dropIfUnreferenced(record.fingerprint);
    this.logger?.info(
      { documentId, fingerprint: record.fingerprint, contentDropped },
      "document invalidated",
    );
    return true;
  }

  async clearQueryCache(): Promise<void> {
    await this.options.queryCache.clear();
    this.logger?.info("query cache cleared");
  }

  private start(documentId: string, fingerprint: string, pages: readonly RawPage[]): InFlightIngest {
    const controller = new AbortController();
    const observers = new Set<ProgressObserver>();
    const flight: InFlightIngest = {
      fingerprint,
      promise: this.run(documentId, fingerprint, pages, controller.signal, observers),
      controller,
      observers,
      waiters: 0,
    };
    this.inFlight.set(fingerprint, flight);
    void flight.promise.then(
      () => this.release(flight),
      () => this.release(flight),
    );
    return flight;
  }

  private release(flight: InFlightIngest): void {
    if (this.inFlight.get(flight.fingerprint) === flight) {
      this.inFlight.delete(flight.fingerprint);
    }
  }

  private async run(
    documentId: string,
    fingerprint: string,
    pages: readonly RawPage[],
    signal: AbortSignal,
    observers: ReadonlySet<ProgressObserver>,
  ): Promise<IngestOutcome> {
    const emit = (progress: IngestProgress): void => this.emit(observers, progress);

    const cached = await inStage({ operation: "ingest", documentId, stage: "lookup" }, () =>
      this.options.contentCache.get(fingerprint),
    );
    if (cached) {
      new ProgressTracker({ documentId, pagesTotal: cached.pageCount, emit, now: this.now }).finish();
      this.logger?.debug({ documentId, fingerprint }, "content cache hit");
      return toOutcome(cached, true);
    }

    const { value } = await ingest(
      { documentId, fingerprint, pages, signal, onProgress: emit },
      {
        chunkBuilder: this.options.chunkBuilder,
        engine: this.options.engine,
        logger: this.logger,
        now: this.now,
      },
    );
    if (signal.aborted) {
      throw new IngestCancelledError(documentId, { cause: signal.reason });
    }

    const persisted = await inStage({ operation: "ingest", documentId, stage: "commit" }, () => {
      if (signal.aborted) throw new IngestCancelledError(documentId, { cause: signal.reason });
      return this.options.contentCache.put(fingerprint, value);
    });
    if (signal.aborted) {
      // Every caller left during the write; no registry record will point here.
      await this.dropIfUnreferenced(fingerprint);
      throw new IngestCancelledError(documentId, { cause: signal.reason });
    }
    if (!persisted) {
      this.logger?.warn({ documentId, fingerprint }, "content kept in memory only");
    }
    return toOutcome(value, false);
  }

  /** Waits on shared work; this caller's abort rejects only this caller. */
  private async join(
    documentId: string,
    flight: InFlightIngest,
    options: IngestOptions,
  ): Promise<IngestOutcome> {
    const { observer, signal } = options;
    if (observer) flight.observers.add(observer);
    flight.waiters++;

    let onAbort = (): void => undefined;
    try {
      if (!signal) return await flight.promise;
      const cancelled = new Promise<never>((_, reject) => {
        onAbort = () => reject(new IngestCancelledError(documentId, { cause: signal.reason }));
      });
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });
      return await Promise.race([flight.promise, cancelled]);
    } catch (error: unknown) {
      if (error instanceof IngestCancelledError && error.documentId !== documentId) {
        throw new IngestCancelledError(documentId, { cause: error });
      }
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (observer) flight.observers.delete(observer);
      flight.waiters--;
      if (flight.waiters === 0 && signal?.aborted) {
        flight.controller.abort(signal.reason);
        this.release(flight);
      }
    }
  }

  /** Points the document id at the new fingerprint, then drops what it replaced. */
  private async register(documentId: string, outcome: IngestOutcome): Promise<void> {
    const previous = await this.options.contentCache.getDocument(documentId);
    if (previous?.fingerprint === outcome.fingerprint) return;

    const persisted = await this.options.contentCache.putDocument({
      documentId,
      fingerprint: outcome.fingerprint,
      pageCount: outcome.pageCount,
      chunkCount: outcome.chunkCount,
      ingestedAt: new Date(this.now()).toISOString(),
    });
    if (!persisted) {
      this.logger?.warn({ documentId }, "registry record kept in memory only");
    }

    if (previous) {
      const contentDropped = await this.dropIfUnreferenced(previous.fingerprint);
      this.logger?.info(
        { documentId, previous: previous.fingerprint, current: outcome.fingerprint, contentDropped },
        "document content changed",
      );
    }
  }

  /**
   * Content is keyed by fingerprint and may be shared by several document
   * ids. It goes only when no record points at it and no ingest of it is
   * running.
   */
  private async dropIfUnreferenced(fingerprint: string): Promise<boolean> {
    if (this.inFlight.has(fingerprint)) return false;
    if (await this.options.contentCache.isReferenced(fingerprint)) return false;
    await this.options.queryCache.invalidate(fingerprint);
    await this.options.contentCache.invalidate(fingerprint);
    return true;
  }

  private emit(observers: ReadonlySet<ProgressObserver>, progress: IngestProgress): void {
    for (const observer of observers) {
      try {
        observer.onProgress(progress);
      } catch (error: unknown) {
        this.logger?.warn({ err: error, documentId: progress.documentId }, "progress observer failed");
      }
    }
  }
}
