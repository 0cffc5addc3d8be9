export type { KeyValueStore } from "./store.interface.js";
export { FileStore } from "./file-store.js";
export type { FileStoreOptions } from "./file-store.js";
export { MemoryStore } from "./memory-store.js";
export { ContentCache, REGISTRY_PARTITION } from "./content-cache.js";
export type { ContentCacheOptions } from "./content-cache.js";
export { QueryCache, queryKey } from "./query-cache.js";
export type { QueryCacheOptions } from "./query-cache.js";
export {
  chunkSchema,
  contentCacheValueSchema,
  documentRecordSchema,
  queryCacheValueSchema,
  rankedResultSchema,
} from "./schemas.js";
export { CACHE_SCHEMA_VERSION, cacheVersion, deepFreeze } from "./version.js";
export type { CacheVersionParts } from "./version.js";
