import type { EmbedInputType, EmbeddingResult } from "@docseek/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const TOKEN = /[\p{L}\p{N}]+/gu;

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash = Math.imul(hash ^ text.charCodeAt(i), 0x01000193) >>> 0;
  }
  return hash;
}

/** Bag-of-words vector with each lowercased token hashed into a bucket. */
export function hashedBagOfWords(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(TOKEN) ?? []) {
    const bucket = fnv1a(token) % dimensions;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }
  return vector;
}

export interface FakeProviderOptions {
  dimensions?: number;
  model?: string;
  healthy?: boolean;
  /** Any batch containing a matching text rejects. */
  failWhen?: (text: string) => boolean;
  /** Resolves before every batch, to hold calls in flight. */
  gate?: () => Promise<void>;
}

/** Deterministic in-process provider for tests; no network, no model. */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model: string;
  readonly dimensions: number;
  healthy: boolean;
  healthChecks = 0;
  readonly calls: Array<{ texts: string[]; inputType: EmbedInputType }> = [];
  private readonly failWhen: ((text: string) => boolean) | undefined;
  private readonly gate: (() => Promise<void>) | undefined;

  constructor(options: FakeProviderOptions = {}) {
    this.dimensions = options.dimensions ?? 256;
    this.model = options.model ?? "fake-bow";
    this.healthy = options.healthy ?? true;
    this.failWhen = options.failWhen;
    this.gate = options.gate;
  }

  async batchEmbed(texts: string[], inputType: EmbedInputType): Promise<EmbeddingResult> {
    this.calls.push({ texts: [...texts], inputType });
    if (this.gate) await this.gate();
    if (this.failWhen && texts.some(this.failWhen)) {
      throw new Error("fake provider failure");
    }
    return {
      embeddings: texts.map((text) => hashedBagOfWords(text, this.dimensions)),
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    this.healthChecks++;
    return this.healthy;
  }

  /** Number of texts sent to the provider so far. */
  get textsSeen(): number {
    return this.calls.reduce((sum, call) => sum + call.texts.length, 0);
  }
}
