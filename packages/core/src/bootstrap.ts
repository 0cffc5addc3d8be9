import {
  ContentCache,
  FileStore,
  MemoryStore,
  QueryCache,
  cacheVersion,
  contentCacheValueSchema,
  documentRecordSchema,
  queryCacheValueSchema,
} from "@docseek/cache";
import type { KeyValueStore } from "@docseek/cache";
import { AnalysisRunner, CohereAnalyzer } from "@docseek/analysis";
import type { AnalysisOutcome, IPassageAnalyzer } from "@docseek/analysis";
import { ChunkBuilder } from "@docseek/chunker";
import { parseEnv } from "@docseek/config";
import { EmbeddingEngine, createEmbeddingProvider } from "@docseek/embeddings";
import type { IEmbeddingProvider } from "@docseek/embeddings";
import { createLogger } from "@docseek/logger";
import type { Logger } from "@docseek/logger";
import { createRanker } from "@docseek/similarity";
import type {
  AppConfig,
  ContentCacheValue,
  DocumentRecord,
  QueryCacheValue,
  QueryOptions,
  RankedResult,
} from "@docseek/types";
import { RetrievalOrchestrator } from "./orchestrator.js";

export interface RetrievalServiceOverrides {
  provider?: IEmbeddingProvider;
  logger?: Logger;
  contentStore?: KeyValueStore<ContentCacheValue>;
  registryStore?: KeyValueStore<DocumentRecord>;
  queryStore?: KeyValueStore<QueryCacheValue>;
  analyzer?: IPassageAnalyzer;
  /** Base delay between embedding retries. */
  retryBaseDelayMs?: number;
  now?: () => number;
}

export interface AskResult {
  results: RankedResult[];
  analysis: AnalysisOutcome;
}

export interface RetrievalService {
  orchestrator: RetrievalOrchestrator;
  engine: EmbeddingEngine;
  /** Present only when analysis is enabled. */
  analysis: AnalysisRunner | undefined;
  logger: Logger;
  /** Answers the query, then runs analysis over the ranked passages. */
  ask(documentId: string, query: string, options?: QueryOptions): Promise<AskResult>;
  close(): void;
}

function createStores(config: AppConfig, overrides: RetrievalServiceOverrides) {
  const { baseDir, persist } = config.cache;
  return {
    content:
      overrides.contentStore ??
      (persist
        ? new FileStore<ContentCacheValue>({ baseDir, namespace: "content", schema: contentCacheValueSchema })
        : new MemoryStore<ContentCacheValue>("content")),
    registry:
      overrides.registryStore ??
      (persist
        ? new FileStore<DocumentRecord>({ baseDir, namespace: "content", schema: documentRecordSchema })
        : new MemoryStore<DocumentRecord>("content")),
    query:
      overrides.queryStore ??
      (persist
        ? new FileStore<QueryCacheValue>({ baseDir, namespace: "query", schema: queryCacheValueSchema })
        : new MemoryStore<QueryCacheValue>("query")),
  };
}

/**
 * Composition root: one provider, engine and pair of caches per process.
 */
export function createRetrievalService(
  config: AppConfig,
  overrides: RetrievalServiceOverrides = {},
): RetrievalService {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, service: "docseek" });

  const provider = overrides.provider ?? createEmbeddingProvider(config);
  const engine = new EmbeddingEngine(provider, {
    batchSize: config.embedding.batchSize,
    concurrency: config.embedding.concurrency,
    maxRetries: config.embedding.maxRetries,
    retryBaseDelayMs: overrides.retryBaseDelayMs,
    logger,
  });

  const chunkBuilder = new ChunkBuilder(config.chunking);
  const version = cacheVersion({
    provider: provider.name,
    model: provider.model,
    chunkerDigest: chunkBuilder.configDigest,
  });

  const stores = createStores(config, overrides);
  const contentCache = new ContentCache({
    store: stores.content,
    registry: stores.registry,
    version,
    memoryMax: config.cache.contentMemoryMax,
    logger,
  });
  const queryCache = new QueryCache({
    store: stores.query,
    version,
    memoryMax: config.cache.queryMemoryMax,
    logger,
  });

  const orchestrator = new RetrievalOrchestrator({
    chunkBuilder,
    engine,
    ranker: createRanker("linear"),
    contentCache,
    queryCache,
    defaults: { k: config.retrieval.topK, minScore: config.retrieval.minScore },
    logger,
    now: overrides.now,
  });

  const analysis = config.analysis.enabled
    ? new AnalysisRunner(
        overrides.analyzer ??
          new CohereAnalyzer({ apiKey: config.cohere.apiKey, model: config.cohere.chatModel }),
        { timeoutMs: config.analysis.timeoutMs, logger },
      )
    : undefined;

  logger.info(
    {
      provider: provider.name,
      model: provider.model,
      persist: config.cache.persist,
      analysis: config.analysis.enabled,
    },
    "retrieval service ready",
  );

  return {
    orchestrator,
    engine,
    analysis,
    logger,
    async ask(documentId, query, options) {
      const results = await orchestrator.answerQuery(documentId, query, options);
      const outcome: AnalysisOutcome = analysis
        ? await analysis.run({ query, passages: results })
        : { status: "skipped", reason: "disabled" };
      return { results, analysis: outcome };
    },
    close() {
      analysis?.shutdown();
    },
  };
}

/** Same as {@link createRetrievalService}, configured from environment variables. */
export function createRetrievalServiceFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: RetrievalServiceOverrides = {},
): RetrievalService {
  return createRetrievalService(parseEnv(env), overrides);
}
