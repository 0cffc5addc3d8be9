import { LRUCache } from "lru-cache";
import { CacheError } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type { CacheEntry, ContentCacheValue, DocumentRecord } from "@docseek/types";
import type { KeyValueStore } from "./store.interface.js";
import { VersionedCache } from "./versioned-cache.js";
import { deepFreeze } from "./version.js";

const CONTENT_KEY = "content";
/** Registry records live in the content namespace under this partition. */
export const REGISTRY_PARTITION = "documents";

export interface ContentCacheOptions {
  store: KeyValueStore<ContentCacheValue>;
  registry: KeyValueStore<DocumentRecord>;
  version: string;
  memoryMax?: number;
  logger?: Logger;
}

/**
 * Chunks plus embeddings per document fingerprint, and the document id
 * registry. Durable failures degrade to misses; they are logged, not thrown.
 */
export class ContentCache extends VersionedCache {
  private readonly store: KeyValueStore<ContentCacheValue>;
  private readonly registry: KeyValueStore<DocumentRecord>;
  private readonly memory: LRUCache<string, ContentCacheValue>;
  private readonly records = new Map<string, DocumentRecord>();

  constructor(options: ContentCacheOptions) {
    super(options.version, options.logger?.child({ component: "content-cache" }));
    this.store = options.store;
    this.registry = options.registry;
    this.memory = new LRUCache<string, ContentCacheValue>({ max: options.memoryMax ?? 16 });
  }

  async get(fingerprint: string): Promise<ContentCacheValue | undefined> {
    const cached = this.memory.get(fingerprint);
    if (cached) return cached;

    const entry = await this.read(this.store, { partition: fingerprint, key: CONTENT_KEY });
    if (!entry) return undefined;
    if (entry.value.fingerprint !== fingerprint) {
      this.logger?.warn({ fingerprint }, "content entry belongs to another fingerprint, ignoring");
      return undefined;
    }

    const value = deepFreeze(entry.value);
    this.memory.set(fingerprint, value);
    return value;
  }

  /** Replaces the whole entry. Returns false when only the memory tier took it. */
  async put(fingerprint: string, value: ContentCacheValue): Promise<boolean> {
    const frozen = deepFreeze(value);
    this.memory.set(fingerprint, frozen);
    return this.write(this.store, { partition: fingerprint, key: CONTENT_KEY }, frozen);
  }

  async invalidate(fingerprint: string): Promise<void> {
    this.memory.delete(fingerprint);
    await this.remove(() => this.store.deletePartition(fingerprint), { fingerprint });
  }

  async getDocument(documentId: string): Promise<DocumentRecord | undefined> {
    const known = this.records.get(documentId);
    if (known) return known;

    const entry = await this.read(this.registry, { partition: REGISTRY_PARTITION, key: documentId });
    if (!entry) return undefined;
    const record = deepFreeze(entry.value);
    this.records.set(documentId, record);
    return record;
  }

  async putDocument(record: DocumentRecord): Promise<boolean> {
    const frozen = deepFreeze(record);
    this.records.set(record.documentId, frozen);
    return this.write(this.registry, { partition: REGISTRY_PARTITION, key: record.documentId }, frozen);
  }

  async deleteDocument(documentId: string): Promise<void> {
    this.records.delete(documentId);
    await this.remove(
      () => this.registry.delete({ partition: REGISTRY_PARTITION, key: documentId }),
      { documentId },
    );
  }

  /**
   * Whether any registered document still points at `fingerprint`. An
   * unreadable registry counts as referenced, so content is never dropped
   * on a guess.
   */
  async isReferenced(fingerprint: string): Promise<boolean> {
    for (const record of this.records.values()) {
      if (record.fingerprint === fingerprint) return true;
    }

    let entries: CacheEntry<DocumentRecord>[];
    try {
      entries = await this.registry.list(REGISTRY_PARTITION);
    } catch (error: unknown) {
      if (!(error instanceof CacheError)) throw error;
      this.logger?.warn({ err: error, fingerprint }, "registry unreadable, keeping content");
      return true;
    }

    // Records already held in memory were checked above and take precedence.
    return entries.some(
      (entry) =>
        entry.version === this.version &&
        entry.key === entry.value.documentId &&
        !this.records.has(entry.key) &&
        entry.value.fingerprint === fingerprint,
    );
  }

  async clear(): Promise<void> {
    this.memory.clear();
    this.records.clear();
    await this.remove(() => this.store.clear(), {});
    await this.remove(() => this.registry.clear(), {});
  }
}
