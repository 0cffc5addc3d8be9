import { LRUCache } from "lru-cache";
import type { Logger } from "@docseek/logger";
import type { QueryCacheValue, RankedResult } from "@docseek/types";
import type { KeyValueStore } from "./store.interface.js";
import { VersionedCache } from "./versioned-cache.js";
import { deepFreeze } from "./version.js";

export interface QueryCacheOptions {
  store: KeyValueStore<QueryCacheValue>;
  version: string;
  memoryMax?: number;
  logger?: Logger;
}

/** Key of one query within a document partition. */
export function queryKey(query: string, k: number, minScore: number): string {
  return `${query}\u0000k=${k}\u0000min=${minScore}`;
}

function memoryKey(fingerprint: string, key: string): string {
  return `${fingerprint}\u0001${key}`;
}

/**
 * Ranked results per (document, normalised query, k, minScore). Entries are
 * partitioned by fingerprint so a document's queries drop together.
 */
export class QueryCache extends VersionedCache {
  private readonly store: KeyValueStore<QueryCacheValue>;
  private readonly memory: LRUCache<string, readonly RankedResult[]>;

  constructor(options: QueryCacheOptions) {
    super(options.version, options.logger?.child({ component: "query-cache" }));
    this.store = options.store;
    this.memory = new LRUCache<string, readonly RankedResult[]>({ max: options.memoryMax ?? 1000 });
  }

  async get(
    fingerprint: string,
    query: string,
    k: number,
    minScore: number,
  ): Promise<readonly RankedResult[] | undefined> {
    const key = queryKey(query, k, minScore);
    const cached = this.memory.get(memoryKey(fingerprint, key));
    if (cached) return cached;

    const entry = await this.read(this.store, { partition: fingerprint, key });
    if (!entry || entry.value.fingerprint !== fingerprint) return undefined;

    const results = deepFreeze(entry.value.results);
    this.memory.set(memoryKey(fingerprint, key), results);
    return results;
  }

  async put(
    fingerprint: string,
    query: string,
    k: number,
    minScore: number,
    results: readonly RankedResult[],
  ): Promise<boolean> {
    const key = queryKey(query, k, minScore);
    const copy = deepFreeze(results.map((result) => ({ ...result, chunk: { ...result.chunk } })));
    this.memory.set(memoryKey(fingerprint, key), copy);
    return this.write(this.store, { partition: fingerprint, key }, {
      fingerprint,
      query,
      k,
      minScore,
      results: copy,
    });
  }

  async invalidate(fingerprint: string): Promise<void> {
    const prefix = `${fingerprint}\u0001`;
    for (const key of [...this.memory.keys()]) {
      if (key.startsWith(prefix)) this.memory.delete(key);
    }
    await this.remove(() => this.store.deletePartition(fingerprint), { fingerprint });
  }

  async clear(): Promise<void> {
    this.memory.clear();
    await this.remove(() => this.store.clear(), {});
  }
}
