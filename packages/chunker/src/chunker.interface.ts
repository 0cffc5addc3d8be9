import type { Chunk, ChunkBuildResult, ChunkBuilderConfig } from "@docseek/types";

export interface IChunkBuilder {
  readonly config: Readonly<ChunkBuilderConfig>;
  /** Stable digest of the config; part of every cache version tag. */
  readonly configDigest: string;
  build(pages: readonly unknown[], fingerprint?: string): Chunk[];
  buildWithReport(pages: readonly unknown[], fingerprint?: string): ChunkBuildResult;
}
