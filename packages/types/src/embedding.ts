export type EmbedInputType = "document" | "query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IsolatedEmbeddingResult {
  /** One slot per input text; null where the item could not be embedded. */
  vectors: Array<number[] | null>;
  failedIndices: number[];
}

export interface EmbeddingStats {
  providerCalls: number;
  textsEmbedded: number;
  failedItems: number;
}
