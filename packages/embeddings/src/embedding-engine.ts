import os from "node:os";
import { EmbeddingError, ModelUnavailableError, withRetry } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type { EmbedInputType, EmbeddingStats, IsolatedEmbeddingResult } from "@docseek/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { l2Normalize } from "./vector-math.js";
import { runPool } from "./worker-pool.js";

export interface EmbeddingEngineOptions {
  batchSize?: number;
  /** Batches in flight at once. Default: available CPU parallelism. */
  concurrency?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

export interface EmbedIsolatedOptions {
  inputType?: EmbedInputType;
  signal?: AbortSignal;
  /** Called with the input indices of each batch once all of them are embedded or failed. */
  onBatchSettled?: (indices: number[]) => void;
}

interface Batch {
  indices: number[];
  texts: string[];
}

/**
 * Batched, order-preserving embedding over a shared provider.
 * Every vector that leaves the engine is validated and L2-normalised.
 */
export class EmbeddingEngine {
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger | undefined;
  private ready: Promise<void> | undefined;
  private observedDimensions: number | undefined;
  private counters: EmbeddingStats = { providerCalls: 0, textsEmbedded: 0, failedItems: 0 };

  constructor(
    private readonly provider: IEmbeddingProvider,
    options: EmbeddingEngineOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 32);
    this.concurrency = Math.max(1, options.concurrency ?? os.availableParallelism());
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.logger = options.logger?.child({ component: "embedding-engine" });
  }

  get providerName(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.provider.model;
  }

  /** Known vector length: configured on the provider, or seen in a response. */
  get dimensions(): number | undefined {
    return this.provider.dimensions ?? this.observedDimensions;
  }

  stats(): EmbeddingStats {
    return { ...this.counters };
  }

  /** Embed all texts in order; any batch that ultimately fails fails the call. */
  async embed(texts: readonly string[], inputType: EmbedInputType = "document"): Promise<number[][]> {
    await this.ensureReady();
    const results: number[][] = new Array<number[]>(texts.length);

    await runPool(this.toBatches(texts), this.concurrency, async (batch) => {
      const vectors = await this.embedBatch(batch.texts, inputType);
      const invalid = batch.indices.filter((_, j) => vectors[j] == null);
      if (invalid.length > 0) {
        throw new EmbeddingError("Embedding backend returned unusable vectors", invalid, {
          details: { provider: this.provider.name },
        });
      }
      batch.indices.forEach((index, j) => {
        const vector = vectors[j];
        if (vector) results[index] = vector;
      });
    });

    return results;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embed([text], "query");
    if (!vector) {
      throw new EmbeddingError("Query embedding missing", [0]);
    }
    return vector;
  }

  /**
   * Embed with failure isolation: a batch that still fails after retries is
   * split and each item retried alone. Items that cannot be embedded come
   * back as null. Batches not dispatched before the signal aborts are left
   * null without being counted as failures.
   */
  async embedIsolated(
    texts: readonly string[],
    options: EmbedIsolatedOptions = {},
  ): Promise<IsolatedEmbeddingResult> {
    await this.ensureReady();
    const inputType = options.inputType ?? "document";
    const vectors: Array<number[] | null> = texts.map(() => null);
    const failedIndices: number[] = [];

    await runPool(
      this.toBatches(texts),
      this.concurrency,
      async (batch) => {
        let batchVectors: Array<number[] | null>;
        try {
          batchVectors = await this.embedBatch(batch.texts, inputType, options.signal);
        } catch (error: unknown) {
          this.logger?.warn(
            { err: error, size: batch.texts.length, firstIndex: batch.indices[0] },
            "batch failed, retrying items individually",
          );
          batchVectors = await this.embedOneByOne(batch.texts, inputType, options.signal);
        }

        batch.indices.forEach((index, j) => {
          const vector = batchVectors[j] ?? null;
          vectors[index] = vector;
          if (vector === null) failedIndices.push(index);
        });
        options.onBatchSettled?.(batch.indices);
      },
      options.signal,
    );

    failedIndices.sort((a, b) => a - b);
    if (failedIndices.length > 0) {
      this.counters.failedItems += failedIndices.length;
      this.logger?.warn({ failed: failedIndices.length, total: texts.length }, "items skipped");
    }
    return { vectors, failedIndices };
  }

  private async embedOneByOne(
    texts: string[],
    inputType: EmbedInputType,
    signal?: AbortSignal,
  ): Promise<Array<number[] | null>> {
    const results: Array<number[] | null> = [];
    for (const text of texts) {
      if (signal?.aborted) {
        results.push(null);
        continue;
      }
      try {
        const [vector] = await this.embedBatch([text], inputType, signal);
        results.push(vector ?? null);
      } catch (error: unknown) {
        this.logger?.debug({ err: error }, "item failed");
        results.push(null);
      }
    }
    return results;
  }

  /** One provider round-trip with retries; unusable vectors come back as null. */
  private async embedBatch(
    texts: string[],
    inputType: EmbedInputType,
    signal?: AbortSignal,
  ): Promise<Array<number[] | null>> {
    const result = await withRetry(
      async () => {
        this.counters.providerCalls++;
        const response = await this.provider.batchEmbed(texts, inputType);
        if (response.embeddings.length !== texts.length) {
          throw new EmbeddingError(
            `Provider returned ${response.embeddings.length} vectors for ${texts.length} texts`,
          );
        }
        return response;
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseDelayMs,
        signal,
        onRetry: ({ attempt, maxRetries, delayMs, error }) => {
          this.logger?.debug({ attempt, maxRetries, delayMs, err: error }, "retrying batch");
        },
      },
    );

    const vectors = result.embeddings.map((raw) => this.validate(raw));
    this.counters.textsEmbedded += vectors.filter((v) => v !== null).length;
    return vectors;
  }

  private validate(raw: readonly number[]): number[] | null {
    const expected = this.dimensions;
    if (expected !== undefined && raw.length !== expected) return null;
    const vector = l2Normalize(raw);
    if (vector && this.observedDimensions === undefined) {
      this.observedDimensions = vector.length;
    }
    return vector;
  }

  private toBatches(texts: readonly string[]): Batch[] {
    const batches: Batch[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const slice = texts.slice(i, i + this.batchSize);
      batches.push({ texts: slice, indices: slice.map((_, j) => i + j) });
    }
    return batches;
  }

  /** Health check runs once; a failure is kept and rethrown on every later call. */
  private ensureReady(): Promise<void> {
    this.ready ??= this.initialize();
    return this.ready;
  }

  private async initialize(): Promise<void> {
    let healthy: boolean;
    try {
      healthy = await this.provider.healthCheck();
    } catch (error: unknown) {
      throw new ModelUnavailableError(
        `Embedding provider "${this.provider.name}" failed to initialise`,
        this.provider.name,
        { cause: error, details: { model: this.provider.model } },
      );
    }
    if (!healthy) {
      throw new ModelUnavailableError(
        `Embedding provider "${this.provider.name}" is not available`,
        this.provider.name,
        { details: { model: this.provider.model } },
      );
    }
    this.logger?.info(
      { provider: this.provider.name, model: this.provider.model },
      "embedding provider ready",
    );
  }
}
