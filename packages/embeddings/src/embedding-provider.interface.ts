import type { EmbedInputType, EmbeddingResult } from "@docseek/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Vector length, when the backend's model is known ahead of the first call. */
  readonly dimensions: number | undefined;

  batchEmbed(texts: string[], inputType: EmbedInputType): Promise<EmbeddingResult>;
  /** Resolves false, or rejects, when the backend cannot serve embeddings. */
  healthCheck(): Promise<boolean>;
}
