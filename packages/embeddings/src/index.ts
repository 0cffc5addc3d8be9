export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { HttpEmbeddingProvider } from "./http-provider.js";
export type { HttpProviderConfig } from "./http-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig, EmbeddingFactoryOptions } from "./factory.js";
export { EmbeddingEngine } from "./embedding-engine.js";
export type { EmbeddingEngineOptions, EmbedIsolatedOptions } from "./embedding-engine.js";
export { cosineSimilarity, dot, l2Normalize, norm } from "./vector-math.js";
export { runPool } from "./worker-pool.js";
