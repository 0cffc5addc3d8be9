import { CohereClient } from "cohere-ai";
import { EmbeddingError } from "@docseek/errors";
import type { EmbedInputType, EmbeddingResult } from "@docseek/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const MAX_TEXTS_PER_REQUEST = 96;

const INPUT_TYPES = {
  document: "search_document",
  query: "search_query",
} as const;

type CohereInputType = (typeof INPUT_TYPES)[EmbedInputType];

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/**
 * Cohere hosted embeddings. Passages and questions are embedded with the
 * matching `search_*` input type so that they share one retrieval space.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private readonly client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async batchEmbed(texts: string[], inputType: EmbedInputType): Promise<EmbeddingResult> {
    const embeddings: number[][] = [];
    let tokensUsed = 0;

    for (let start = 0; start < texts.length; start += MAX_TEXTS_PER_REQUEST) {
      const slice = texts.slice(start, start + MAX_TEXTS_PER_REQUEST);
      const result = await this.request(slice, INPUT_TYPES[inputType]);
      embeddings.push(...result.vectors);
      tokensUsed += result.tokens;
    }

    return { embeddings, model: this.model, tokensUsed, dimensions: this.dimensions };
  }

  /** Errors propagate so the engine can report why the model is unavailable. */
  async healthCheck(): Promise<boolean> {
    const { vectors } = await this.request(["health check"], INPUT_TYPES.query);
    return vectors.length === 1;
  }

  private async request(
    texts: string[],
    inputType: CohereInputType,
  ): Promise<{ vectors: number[][]; tokens: number }> {
    const response = await this.client.v2.embed({
      texts,
      model: this.model,
      inputType,
      embeddingTypes: ["float"],
    });

    const vectors = response.embeddings.float;
    if (!vectors) {
      throw new EmbeddingError(`Cohere returned no float embeddings for model ${this.model}`, [], {
        details: { model: this.model, texts: texts.length },
      });
    }
    return { vectors, tokens: response.meta?.billedUnits?.inputTokens ?? 0 };
  }
}
