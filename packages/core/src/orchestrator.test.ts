import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryStore } from "@docseek/cache";
import { FakeEmbeddingProvider } from "@docseek/embeddings/testing";
import {
  DocumentNotIngestedError,
  IngestCancelledError,
  InputError,
  ModelUnavailableError,
  PipelineError,
} from "@docseek/errors";
import type { ContentCacheValue, IngestProgress, RawPage } from "@docseek/types";
import { createRetrievalServiceFromEnv } from "./bootstrap.js";
import type { RetrievalService, RetrievalServiceOverrides } from "./bootstrap.js";

const PAGES: RawPage[] = [
  { pageIndex: 0, text: "Paris is the capital of France." },
  { pageIndex: 1, text: "The Eiffel Tower is in Paris." },
];

let baseDir: string;
const services: RetrievalService[] = [];

function createService(
  provider: FakeEmbeddingProvider,
  env: Record<string, string> = {},
  overrides: RetrievalServiceOverrides = {},
): RetrievalService {
  const service = createRetrievalServiceFromEnv(
    {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      DOCSEEK_CACHE_DIR: baseDir,
      EMBEDDING_CONCURRENCY: "2",
      EMBEDDING_MAX_RETRIES: "0",
      ...env,
    },
    { provider, retryBaseDelayMs: 1, ...overrides },
  );
  services.push(service);
  return service;
}

function deferred(): { promise: Promise<void>; release: () => void } {
  let release = (): void => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

beforeEach(async () => {
  baseDir = await mkdtemp(path.join(os.tmpdir(), "docseek-core-"));
});

afterEach(async () => {
  for (const service of services.splice(0)) service.close();
  await rm(baseDir, { recursive: true, force: true });
});

describe("RetrievalOrchestrator", () => {
  it("ingests a document and ranks its passages for a question", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);

    const ingested = await orchestrator.ingestDocument("atlas.pdf", PAGES);
    expect(ingested).toMatchObject({
      documentId: "atlas.pdf",
      pageCount: 2,
      chunkCount: 2,
      skippedCount: 0,
      fromCache: false,
      model: "fake-bow",
      dimensions: 256,
    });

    const results = await orchestrator.answerQuery("atlas.pdf", "  What is the   capital of France? ");
    expect(results.map((r) => [r.rank, r.chunk.pageIndex, r.confidence])).toEqual([
      [1, 0, 83.3],
      [2, 1, 33.3],
    ]);
    expect(results[0]!.chunk.content).toBe("Paris is the capital of France.");
    expect(results[0]!.score).toBeCloseTo(5 / 6, 10);
    expect(provider.calls.at(-1)).toEqual({
      texts: ["what is the capital of france?"],
      inputType: "query",
    });

    const eiffel = await orchestrator.answerQuery("atlas.pdf", "Where is the Eiffel Tower?", { k: 1 });
    expect(eiffel).toHaveLength(1);
    expect(eiffel[0]!.chunk.content).toBe("The Eiffel Tower is in Paris.");
    expect(eiffel[0]!.confidence).toBe(73);
  });

  it("serves repeated ingests and queries from the caches", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);

    const first = await orchestrator.ingestDocument("atlas.pdf", PAGES);
    const second = await orchestrator.ingestDocument("atlas.pdf", PAGES);
    expect(second.fromCache).toBe(true);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.chunkCount).toBe(2);
    expect(provider.textsSeen).toBe(2);

    const a = await orchestrator.answerQuery("atlas.pdf", "capital of France");
    const callsAfterFirstQuery = provider.calls.length;
    const b = await orchestrator.answerQuery("atlas.pdf", "CAPITAL of  france");
    expect(b).toEqual(a);
    expect(provider.calls.length).toBe(callsAfterFirstQuery);
    expect(provider.healthChecks).toBe(1);
  });

  it("returns the same answers after a restart without embedding again", async () => {
    const before = createService(new FakeEmbeddingProvider());
    const ingested = await before.orchestrator.ingestDocument("atlas.pdf", PAGES);
    const answer = await before.orchestrator.answerQuery("atlas.pdf", "capital of France");

    const provider = new FakeEmbeddingProvider();
    const after = createService(provider);
    expect(await after.orchestrator.getDocumentState("atlas.pdf")).toBe("ingested");
    expect(await after.orchestrator.answerQuery("atlas.pdf", "capital of France")).toEqual(answer);

    const again = await after.orchestrator.ingestDocument("atlas.pdf", PAGES);
    expect(again.fromCache).toBe(true);
    expect(again.fingerprint).toBe(ingested.fingerprint);
    expect(provider.calls).toHaveLength(0);
  });

  it("keeps one chunk per distinct passage", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    const result = await orchestrator.ingestDocument("rivers.pdf", [
      { pageIndex: 0, text: "Rivers carry sediment toward the sea." },
      {
        pageIndex: 1,
        text: "Rivers carry sediment toward the sea.\n\nDeltas form where the current slows down.",
      },
    ]);
    expect(result.chunkCount).toBe(2);

    const results = await orchestrator.answerQuery("rivers.pdf", "rivers and deltas", {
      k: 10,
      minScore: -1,
    });
    expect(results.map((r) => r.chunk.content).sort()).toEqual([
      "Deltas form where the current slows down.",
      "Rivers carry sediment toward the sea.",
    ]);
    expect(new Set(results.map((r) => r.chunk.contentHash)).size).toBe(2);
  });

  it("respects k and the minimum score", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    await orchestrator.ingestDocument("atlas.pdf", PAGES);
    const question = "what is the capital of france?";

    const strict = await orchestrator.answerQuery("atlas.pdf", question, { minScore: 0.5 });
    expect(strict.map((r) => r.chunk.pageIndex)).toEqual([0]);

    const single = await orchestrator.answerQuery("atlas.pdf", question, { k: 1, minScore: 0 });
    expect(single).toHaveLength(1);
    expect(single[0]!.rank).toBe(1);

    expect(await orchestrator.answerQuery("atlas.pdf", question, { minScore: 0.9 })).toEqual([]);
  });

  it("rejects malformed queries", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    await orchestrator.ingestDocument("atlas.pdf", PAGES);

    await expect(orchestrator.answerQuery("atlas.pdf", "   ")).rejects.toBeInstanceOf(InputError);
    await expect(orchestrator.answerQuery("atlas.pdf", "paris", { k: 0 })).rejects.toBeInstanceOf(
      InputError,
    );
    await expect(orchestrator.answerQuery("atlas.pdf", "paris", { k: 1.5 })).rejects.toBeInstanceOf(
      InputError,
    );
    await expect(
      orchestrator.answerQuery("atlas.pdf", "paris", { minScore: 2 }),
    ).rejects.toBeInstanceOf(InputError);
    await expect(orchestrator.ingestDocument("", PAGES)).rejects.toBeInstanceOf(InputError);
  });

  it("raises DocumentNotIngestedError for unknown documents", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    await expect(orchestrator.answerQuery("missing.pdf", "paris")).rejects.toBeInstanceOf(
      DocumentNotIngestedError,
    );
    expect(await orchestrator.getDocumentState("missing.pdf")).toBe("uningested");
  });

  it("drops the previous version when a document's content changes", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);
    const original = await orchestrator.ingestDocument("capitals.pdf", PAGES);
    await orchestrator.answerQuery("capitals.pdf", "what is the capital of france?");

    const changed = await orchestrator.ingestDocument("capitals.pdf", [
      { pageIndex: 0, text: "Berlin is the capital of Germany." },
    ]);
    expect(changed.fromCache).toBe(false);
    expect(changed.fingerprint).not.toBe(original.fingerprint);

    const results = await orchestrator.answerQuery("capitals.pdf", "what is the capital of france?");
    expect(results).toHaveLength(1);
    expect(results[0]!.chunk.content).toBe("Berlin is the capital of Germany.");
    expect(results[0]!.confidence).toBe(66.7);

    const seen = provider.textsSeen;
    const restored = await orchestrator.ingestDocument("capitals.pdf", PAGES);
    expect(restored.fromCache).toBe(false);
    expect(provider.textsSeen).toBe(seen + 2);
  });

  it("keeps content that another document id still points at", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);
    await orchestrator.ingestDocument("a.pdf", PAGES);
    expect((await orchestrator.ingestDocument("b.pdf", PAGES)).fromCache).toBe(true);

    await orchestrator.ingestDocument("a.pdf", [
      { pageIndex: 0, text: "Berlin is the capital of Germany." },
    ]);

    expect(await orchestrator.getDocumentState("b.pdf")).toBe("ingested");
    const results = await orchestrator.answerQuery("b.pdf", "What is the capital of France?");
    expect(results.map((r) => r.confidence)).toEqual([83.3, 33.3]);

    expect(await orchestrator.invalidateDocument("b.pdf")).toBe(true);
    const seen = provider.textsSeen;
    expect((await orchestrator.ingestDocument("b.pdf", PAGES)).fromCache).toBe(false);
    expect(provider.textsSeen).toBe(seen + 2);
  });

  it("keeps shared content on invalidation and across a restart", async () => {
    const before = createService(new FakeEmbeddingProvider());
    await before.orchestrator.ingestDocument("a.pdf", PAGES);
    await before.orchestrator.ingestDocument("b.pdf", PAGES);
    await before.orchestrator.ingestDocument("c.pdf", PAGES);
    expect(await before.orchestrator.invalidateDocument("c.pdf")).toBe(true);

    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);
    await orchestrator.ingestDocument("a.pdf", [
      { pageIndex: 0, text: "Berlin is the capital of Germany." },
    ]);

    expect(await orchestrator.answerQuery("b.pdf", "What is the capital of France?")).toHaveLength(2);
    expect((await orchestrator.ingestDocument("c.pdf", PAGES)).fromCache).toBe(true);
    expect(
      provider.calls.filter((call) => call.inputType === "document").flatMap((call) => call.texts),
    ).toEqual(["Berlin is the capital of Germany."]);
  });

  it("embeds once when the same content is ingested concurrently", async () => {
    const gate = deferred();
    const provider = new FakeEmbeddingProvider({ gate: () => gate.promise });
    const { orchestrator } = createService(provider);

    const first = orchestrator.ingestDocument("a.pdf", PAGES);
    const second = orchestrator.ingestDocument("b.pdf", PAGES);
    expect(await orchestrator.getDocumentState("a.pdf")).toBe("ingesting");
    gate.release();

    const [a, b] = await Promise.all([first, second]);
    expect(a.fingerprint).toBe(b.fingerprint);
    expect(b.fromCache).toBe(false);
    expect(provider.textsSeen).toBe(2);
    expect(await orchestrator.getDocumentState("a.pdf")).toBe("ingested");
    expect(await orchestrator.getDocumentState("b.pdf")).toBe("ingested");
  });

  it("commits nothing when an ingest is cancelled", async () => {
    const gate = deferred();
    const provider = new FakeEmbeddingProvider({ gate: () => gate.promise });
    const { orchestrator } = createService(provider);
    const controller = new AbortController();

    const pending = orchestrator.ingestDocument("atlas.pdf", PAGES, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(IngestCancelledError);
    gate.release();

    expect(await orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
    await expect(orchestrator.answerQuery("atlas.pdf", "paris")).rejects.toBeInstanceOf(
      DocumentNotIngestedError,
    );
    const retried = await orchestrator.ingestDocument("atlas.pdf", PAGES);
    expect(retried.fromCache).toBe(false);
  });

  it("rejects an already-aborted ingest without touching the provider", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);

    await expect(
      orchestrator.ingestDocument("atlas.pdf", PAGES, { signal: AbortSignal.abort() }),
    ).rejects.toBeInstanceOf(IngestCancelledError);
    expect(provider.calls).toHaveLength(0);
    expect(provider.healthChecks).toBe(0);
  });

  it("keeps shared work running when only one of its callers cancels", async () => {
    const gate = deferred();
    const provider = new FakeEmbeddingProvider({ gate: () => gate.promise });
    const { orchestrator } = createService(provider);
    const controller = new AbortController();

    const cancelled = orchestrator.ingestDocument("a.pdf", PAGES, { signal: controller.signal });
    const kept = orchestrator.ingestDocument("b.pdf", PAGES);
    controller.abort();
    await expect(cancelled).rejects.toMatchObject({ documentId: "a.pdf" });
    gate.release();

    expect((await kept).chunkCount).toBe(2);
    expect(await orchestrator.getDocumentState("a.pdf")).toBe("uningested");
    expect(await orchestrator.getDocumentState("b.pdf")).toBe("ingested");
  });

  it("discards content whose write finishes after every caller cancelled", async () => {
    const writing = deferred();
    const finishWrite = deferred();
    const dropped = deferred();
    class SlowStore extends MemoryStore<ContentCacheValue> {
      override async put(...args: Parameters<MemoryStore<ContentCacheValue>["put"]>): Promise<void> {
        writing.release();
        await finishWrite.promise;
        return super.put(...args);
      }

      override async deletePartition(partition: string): Promise<void> {
        await super.deletePartition(partition);
        dropped.release();
      }
    }
    const store = new SlowStore("content");
    const { orchestrator } = createService(new FakeEmbeddingProvider(), {}, { contentStore: store });
    const controller = new AbortController();

    const pending = orchestrator.ingestDocument("atlas.pdf", PAGES, { signal: controller.signal });
    await writing.promise;
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(IngestCancelledError);
    finishWrite.release();
    await dropped.promise;

    expect(store.size).toBe(0);
    expect(await orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
    expect((await orchestrator.ingestDocument("atlas.pdf", PAGES)).fromCache).toBe(false);
  });

  it("caches model unavailability with document context", async () => {
    const provider = new FakeEmbeddingProvider({ healthy: false });
    const { orchestrator } = createService(provider);

    const error = await orchestrator.ingestDocument("atlas.pdf", PAGES).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ModelUnavailableError);
    expect(error).toMatchObject({
      details: { documentId: "atlas.pdf", stage: "embed", model: "fake-bow" },
    });
    expect(error).toHaveProperty("cause");

    await expect(orchestrator.ingestDocument("atlas.pdf", PAGES)).rejects.toBeInstanceOf(
      ModelUnavailableError,
    );
    expect(provider.healthChecks).toBe(1);
    expect(await orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
  });

  it("skips chunks that cannot be embedded and keeps sequences contiguous", async () => {
    const provider = new FakeEmbeddingProvider({ failWhen: (text) => text.includes("broken") });
    const { orchestrator } = createService(provider, { CHUNK_MAX_WORDS: "8" });

    const result = await orchestrator.ingestDocument("notes.pdf", [
      {
        pageIndex: 0,
        text: "The broken sentence fails to embed.\n\nThe second sentence embeds without trouble.",
      },
    ]);
    expect(result.chunkCount).toBe(1);
    expect(result.skippedCount).toBe(1);
    expect(provider.calls.map((call) => call.texts.length)).toEqual([2, 1, 1]);

    const results = await orchestrator.answerQuery("notes.pdf", "second sentence", { minScore: -1 });
    expect(results).toHaveLength(1);
    expect(results[0]!.chunk).toMatchObject({
      id: `${result.fingerprint.slice(0, 16)}:0:0`,
      sequence: 0,
      content: "The second sentence embeds without trouble.",
    });
  });

  it("fails the ingest when no chunk can be embedded", async () => {
    const provider = new FakeEmbeddingProvider({ failWhen: () => true });
    const { orchestrator } = createService(provider);

    await expect(orchestrator.ingestDocument("atlas.pdf", PAGES)).rejects.toMatchObject({
      code: "EMBEDDING_ERROR",
      itemIndices: [0, 1],
      details: { documentId: "atlas.pdf", stage: "embed" },
    });
    expect(await orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
  });

  it("reports page progress with a remaining-time estimate", async () => {
    let clock = 0;
    const provider = new FakeEmbeddingProvider({
      gate: async () => {
        clock += 1000;
      },
    });
    const { orchestrator } = createService(
      provider,
      { EMBEDDING_BATCH_SIZE: "1", EMBEDDING_CONCURRENCY: "1" },
      { now: () => clock },
    );
    const events: IngestProgress[] = [];
    const pages = [
      ...PAGES,
      { pageIndex: 2, text: "The Louvre houses many famous paintings." },
    ];

    await orchestrator.ingestDocument("atlas.pdf", pages, {
      observer: { onProgress: (progress) => events.push(progress) },
    });
    expect(events.map((e) => [e.pagesDone, e.elapsedSeconds, e.estimatedSecondsRemaining])).toEqual([
      [0, 0, null],
      [1, 1, 2],
      [2, 2, 1],
      [3, 3, 0],
    ]);
    expect(events.every((e) => e.pagesTotal === 3 && e.documentId === "atlas.pdf")).toBe(true);

    const cached: IngestProgress[] = [];
    await orchestrator.ingestDocument("atlas.pdf", pages, {
      observer: { onProgress: (progress) => cached.push(progress) },
    });
    expect(cached).toEqual([
      {
        documentId: "atlas.pdf",
        pagesDone: 3,
        pagesTotal: 3,
        elapsedSeconds: 0,
        estimatedSecondsRemaining: 0,
      },
    ]);
  });

  it("does not fail an ingest because an observer throws", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    const onProgress = vi.fn(() => {
      throw new Error("observer broke");
    });

    const result = await orchestrator.ingestDocument("atlas.pdf", PAGES, { observer: { onProgress } });
    expect(result.chunkCount).toBe(2);
    expect(onProgress).toHaveBeenCalled();
  });

  it("answers an empty document with no results and no query embedding", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);

    const result = await orchestrator.ingestDocument("blank.pdf", []);
    expect(result).toMatchObject({ pageCount: 0, chunkCount: 0, dimensions: 256 });
    expect(await orchestrator.answerQuery("blank.pdf", "anything")).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it("invalidates a document and clears the query cache", async () => {
    const provider = new FakeEmbeddingProvider();
    const { orchestrator } = createService(provider);
    await orchestrator.ingestDocument("atlas.pdf", PAGES);
    await orchestrator.answerQuery("atlas.pdf", "paris");

    await orchestrator.clearQueryCache();
    const calls = provider.calls.length;
    await orchestrator.answerQuery("atlas.pdf", "paris");
    expect(provider.calls.length).toBe(calls + 1);

    expect(await orchestrator.invalidateDocument("atlas.pdf")).toBe(true);
    expect(await orchestrator.invalidateDocument("atlas.pdf")).toBe(false);
    expect(await orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
    await expect(orchestrator.answerQuery("atlas.pdf", "paris")).rejects.toBeInstanceOf(
      DocumentNotIngestedError,
    );
    expect((await orchestrator.ingestDocument("atlas.pdf", PAGES)).fromCache).toBe(false);
  });

  it("returns results callers can modify without affecting the cache", async () => {
    const { orchestrator } = createService(new FakeEmbeddingProvider());
    await orchestrator.ingestDocument("atlas.pdf", PAGES);

    const question = "what is the capital of france?";
    const first = await orchestrator.answerQuery("atlas.pdf", question);
    first[0]!.chunk.content = "changed";
    first.pop();

    const second = await orchestrator.answerQuery("atlas.pdf", question);
    expect(second).toHaveLength(2);
    expect(second[0]!.chunk.content).toBe("Paris is the capital of France.");
  });

  it("wraps unexpected failures with the document and stage", async () => {
    class ExplodingStore extends MemoryStore<ContentCacheValue> {
      override async get(): Promise<never> {
        throw new Error("disk on fire");
      }
    }
    const { orchestrator } = createService(
      new FakeEmbeddingProvider(),
      {},
      { contentStore: new ExplodingStore("content") },
    );

    const error = await orchestrator.ingestDocument("atlas.pdf", PAGES).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      message: 'Ingest of document "atlas.pdf" failed at lookup: disk on fire',
      details: { documentId: "atlas.pdf", stage: "lookup" },
    });
  });
});

describe("createRetrievalService", () => {
  it("reports analysis as disabled by default", async () => {
    const service = createService(new FakeEmbeddingProvider());
    await service.orchestrator.ingestDocument("atlas.pdf", PAGES);

    const { results, analysis } = await service.ask("atlas.pdf", "What is the capital of France?");
    expect(results).toHaveLength(2);
    expect(analysis).toEqual({ status: "skipped", reason: "disabled" });
    expect(service.analysis).toBeUndefined();
  });

  it("runs the analyzer over the ranked passages when enabled", async () => {
    const analyze = vi.fn(async ({ passages }: { passages: readonly unknown[] }) => {
      return `Found ${passages.length} passages`;
    });
    const service = createService(
      new FakeEmbeddingProvider(),
      { ANALYSIS_ENABLED: "true", COHERE_API_KEY: "test-key" },
      { analyzer: { name: "stub", analyze } },
    );
    await service.orchestrator.ingestDocument("atlas.pdf", PAGES);

    const { analysis } = await service.ask("atlas.pdf", "What is the capital of France?");
    expect(analysis).toEqual({ status: "ok", text: "Found 2 passages" });
    expect(analyze).toHaveBeenCalledWith(
      expect.objectContaining({ query: "What is the capital of France?" }),
    );
  });

  it("keeps everything in memory when persistence is off", async () => {
    const provider = new FakeEmbeddingProvider();
    const service = createService(provider, { DOCSEEK_CACHE_PERSIST: "false" });
    await service.orchestrator.ingestDocument("atlas.pdf", PAGES);

    const restarted = createService(new FakeEmbeddingProvider(), { DOCSEEK_CACHE_PERSIST: "false" });
    expect(await restarted.orchestrator.getDocumentState("atlas.pdf")).toBe("uningested");
    expect(await service.orchestrator.getDocumentState("atlas.pdf")).toBe("ingested");
  });
});
