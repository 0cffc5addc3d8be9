import os from "node:os";
import { z } from "zod";
import type { AppConfig } from "@docseek/types";
import { defaultCacheDir } from "./cache-dir.js";

function positiveInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());
}

function ratio(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().min(0).max(1));
}

function flag(defaultValue: "true" | "false") {
  return z
    .enum(["true", "false"])
    .default(defaultValue)
    .transform((val) => val === "true");
}

/**
 * Zod schema for the environment variables the service reads.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

    // ---------- Cache ----------
    DOCSEEK_CACHE_DIR: z.string().min(1).optional(),
    DOCSEEK_CACHE_PERSIST: flag("true"),
    CONTENT_CACHE_MEMORY_MAX: positiveInt("16"),
    QUERY_CACHE_MEMORY_MAX: positiveInt("1000"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["http", "cohere"]).default("http"),
    EMBEDDING_BASE_URL: z
      .string()
      .default("http://localhost:8080")
      .refine((url) => url.startsWith("http://") || url.startsWith("https://"), {
        message: "EMBEDDING_BASE_URL must start with http:// or https://",
      }),
    EMBEDDING_MODEL: z.string().min(1).default("sentence-transformers/all-mpnet-base-v2"),
    EMBEDDING_DIMENSIONS: z
      .string()
      .optional()
      .transform((val) => (val === undefined ? undefined : Number(val)))
      .pipe(z.number().int().positive().optional()),
    EMBEDDING_BATCH_SIZE: positiveInt("32"),
    EMBEDDING_CONCURRENCY: z
      .string()
      .optional()
      .transform((val) => (val === undefined ? undefined : Number(val)))
      .pipe(z.number().int().positive().optional()),
    EMBEDDING_MAX_RETRIES: z
      .string()
      .default("2")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- Cohere ----------
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),

    // ---------- Chunking ----------
    CHUNK_MAX_WORDS: positiveInt("150"),
    CHUNK_MIN_WORDS: positiveInt("5"),
    CHUNK_MIN_CHARS: positiveInt("20"),
    CHUNK_MIN_ALPHA_RATIO: ratio("0.5"),
    BOILERPLATE_LINES: positiveInt("2"),
    BOILERPLATE_MIN_PAGES: positiveInt("3"),
    BOILERPLATE_RATIO: ratio("0.5"),

    // ---------- Retrieval ----------
    RETRIEVAL_TOP_K: positiveInt("3"),
    RETRIEVAL_MIN_SCORE: z
      .string()
      .default("0.3")
      .transform(Number)
      .pipe(z.number().min(-1).max(1)),

    // ---------- Analysis ----------
    ANALYSIS_ENABLED: flag("false"),
    ANALYSIS_TIMEOUT_MS: positiveInt("30000"),
  })
  .superRefine((env, ctx) => {
    const needsCohere = env.EMBEDDING_PROVIDER === "cohere" || env.ANALYSIS_ENABLED;
    if (needsCohere && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when Cohere embeddings or analysis are enabled",
      });
    }
    if (env.CHUNK_MIN_WORDS > env.CHUNK_MAX_WORDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_MIN_WORDS"],
        message: "CHUNK_MIN_WORDS must not exceed CHUNK_MAX_WORDS",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    cache: {
      baseDir: parsed.DOCSEEK_CACHE_DIR ?? defaultCacheDir({ env }),
      persist: parsed.DOCSEEK_CACHE_PERSIST,
      contentMemoryMax: parsed.CONTENT_CACHE_MEMORY_MAX,
      queryMemoryMax: parsed.QUERY_CACHE_MEMORY_MAX,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      baseUrl: parsed.EMBEDDING_BASE_URL,
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      concurrency: parsed.EMBEDDING_CONCURRENCY ?? os.availableParallelism(),
      maxRetries: parsed.EMBEDDING_MAX_RETRIES,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      chatModel: parsed.COHERE_CHAT_MODEL,
    },

    chunking: {
      maxWords: parsed.CHUNK_MAX_WORDS,
      minWords: parsed.CHUNK_MIN_WORDS,
      minChars: parsed.CHUNK_MIN_CHARS,
      minAlphaRatio: parsed.CHUNK_MIN_ALPHA_RATIO,
      boilerplateLines: parsed.BOILERPLATE_LINES,
      boilerplateMinPages: parsed.BOILERPLATE_MIN_PAGES,
      boilerplateRatio: parsed.BOILERPLATE_RATIO,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      minScore: parsed.RETRIEVAL_MIN_SCORE,
    },

    analysis: {
      enabled: parsed.ANALYSIS_ENABLED,
      timeoutMs: parsed.ANALYSIS_TIMEOUT_MS,
    },
  };
}
