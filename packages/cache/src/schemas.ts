import { z } from "zod";
import type {
  Chunk,
  ContentCacheValue,
  DocumentRecord,
  QueryCacheValue,
  RankedResult,
} from "@docseek/types";

export const chunkSchema: z.ZodType<Chunk> = z.object({
  id: z.string(),
  documentFingerprint: z.string(),
  pageIndex: z.number().int(),
  sequence: z.number().int().nonnegative(),
  content: z.string().min(1),
  contentHash: z.string(),
  wordCount: z.number().int().positive(),
});

export const contentCacheValueSchema: z.ZodType<ContentCacheValue> = z
  .object({
    documentId: z.string(),
    fingerprint: z.string(),
    pageCount: z.number().int().nonnegative(),
    chunks: z.array(chunkSchema),
    embeddings: z.array(z.array(z.number())),
    model: z.string(),
    dimensions: z.number().int().nonnegative(),
    skippedCount: z.number().int().nonnegative(),
  })
  .refine((value) => value.embeddings.length === value.chunks.length, {
    message: "embeddings must be parallel to chunks",
  })
  .refine((value) => value.embeddings.every((vector) => vector.length === value.dimensions), {
    message: "every embedding must match the recorded dimensions",
  });

export const documentRecordSchema: z.ZodType<DocumentRecord> = z.object({
  documentId: z.string(),
  fingerprint: z.string(),
  pageCount: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
  ingestedAt: z.string(),
});

export const rankedResultSchema: z.ZodType<RankedResult> = z.object({
  rank: z.number().int().positive(),
  chunk: chunkSchema,
  score: z.number().min(-1).max(1),
  confidence: z.number().min(0).max(100),
});

export const queryCacheValueSchema: z.ZodType<QueryCacheValue> = z.object({
  fingerprint: z.string(),
  query: z.string(),
  k: z.number().int().positive(),
  minScore: z.number(),
  results: z.array(rankedResultSchema),
});
