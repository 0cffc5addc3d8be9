export type { IChunkBuilder } from "./chunker.interface.js";
export { ChunkBuilder, DEFAULT_CHUNK_BUILDER_CONFIG, chunkId } from "./chunk-builder.js";
export { fingerprintPages, hashContent, isValidPage, sortPages } from "./content-hash.js";
export { cleanLine, countWords, normalizeForHash } from "./text-cleaner.js";
