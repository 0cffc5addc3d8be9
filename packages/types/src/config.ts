import type { ChunkBuilderConfig } from "./chunk.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type EmbeddingProviderType = "http" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: LogLevel;
  cache: CacheConfig;
  embedding: EmbeddingConfig;
  cohere: CohereConfig;
  chunking: ChunkBuilderConfig;
  retrieval: RetrievalConfig;
  analysis: AnalysisConfig;
}

export interface CacheConfig {
  baseDir: string;
  persist: boolean;
  contentMemoryMax: number;
  queryMemoryMax: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  baseUrl: string;
  model: string;
  dimensions?: number;
  batchSize: number;
  concurrency: number;
  maxRetries: number;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  chatModel: string;
}

export interface RetrievalConfig {
  topK: number;
  minScore: number;
}

export interface AnalysisConfig {
  enabled: boolean;
  timeoutMs: number;
}
