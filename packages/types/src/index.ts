export type {
  RawPage,
  Chunk,
  ChunkBuilderConfig,
  ChunkBuildReport,
  ChunkBuildResult,
} from "./chunk.js";
export type {
  DocumentState,
  DocumentRecord,
  IngestResult,
  IngestProgress,
  ProgressObserver,
  IngestOptions,
} from "./document.js";
export type { QueryOptions, RankedResult, RankCandidate, RankParams } from "./query.js";
export type {
  EmbedInputType,
  EmbeddingResult,
  IsolatedEmbeddingResult,
  EmbeddingStats,
} from "./embedding.js";
export type {
  StoreKey,
  CacheEntry,
  ContentCacheValue,
  QueryCacheValue,
} from "./cache.js";
export type {
  AppConfig,
  LogLevel,
  EmbeddingProviderType,
  CacheConfig,
  EmbeddingConfig,
  CohereConfig,
  RetrievalConfig,
  AnalysisConfig,
} from "./config.js";
