import { ModelUnavailableError } from "@docseek/errors";
import type { CohereConfig, EmbeddingConfig } from "@docseek/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";

export interface EmbeddingFactoryConfig {
  embedding: Pick<EmbeddingConfig, "provider" | "baseUrl" | "model" | "dimensions">;
  cohere: Pick<CohereConfig, "apiKey" | "embedModel">;
}

export interface EmbeddingFactoryOptions {
  /** Passed to the http backend; defaults to the global fetch. */
  fetch?: typeof fetch;
}

/**
 * Picks the backend named by `embedding.provider`. Runs once per process;
 * the engine never sees which backend it got.
 */
export function createEmbeddingProvider(
  config: EmbeddingFactoryConfig,
  options: EmbeddingFactoryOptions = {},
): IEmbeddingProvider {
  const { embedding, cohere } = config;

  switch (embedding.provider) {
    case "http":
      return new HttpEmbeddingProvider({
        baseUrl: embedding.baseUrl,
        model: embedding.model,
        dimensions: embedding.dimensions,
        fetch: options.fetch,
      });
    case "cohere":
      if (cohere.apiKey.length === 0) {
        throw new ModelUnavailableError("COHERE_API_KEY is not set", "cohere", {
          details: { model: cohere.embedModel },
        });
      }
      return new CohereEmbeddingProvider({
        apiKey: cohere.apiKey,
        model: cohere.embedModel,
        dimensions: embedding.dimensions,
      });
    default: {
      const unknown: never = embedding.provider;
      throw new ModelUnavailableError(`Unknown embedding provider: ${String(unknown)}`, String(unknown));
    }
  }
}
