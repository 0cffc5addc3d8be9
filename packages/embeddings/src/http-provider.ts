import { z } from "zod";
import type { EmbedInputType, EmbeddingResult } from "@docseek/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "sentence-transformers/all-mpnet-base-v2";

const KNOWN_DIMENSIONS: Record<string, number> = {
  "sentence-transformers/all-mpnet-base-v2": 768,
  "sentence-transformers/all-MiniLM-L6-v2": 384,
  "sentence-transformers/multi-qa-mpnet-base-dot-v1": 768,
};

export interface HttpProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
  /** Custom fetch implementation; defaults to the global one. */
  fetch?: typeof fetch;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().optional(),
});

/**
 * Self-hosted sentence-embedding server.
 * POST /embed {texts, model, input_type, dimensions?} -> {embeddings, tokens_used?}.
 * Device selection (GPU/CPU) is the server's concern.
 */
export class HttpEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "http";
  readonly model: string;
  readonly dimensions: number | undefined;
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? KNOWN_DIMENSIONS[this.model];
    this.fetchFn = config.fetch ?? fetch;
  }

  async batchEmbed(texts: string[], inputType: EmbedInputType): Promise<EmbeddingResult> {
    const response = await this.fetchFn(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        texts,
        model: this.model,
        input_type: inputType,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      }),
    });

    if (!response.ok) {
      throw new Error(`Embedding server request failed: ${response.status} ${response.statusText}`);
    }

    const data = embedResponseSchema.parse(await response.json());

    return {
      embeddings: data.embeddings,
      model: this.model,
      tokensUsed: data.tokens_used ?? 0,
      dimensions: this.dimensions ?? data.embeddings[0]?.length ?? 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
