import { CacheError } from "@docseek/errors";
import type { Logger } from "@docseek/logger";
import type { CacheEntry, StoreKey } from "@docseek/types";
import type { KeyValueStore } from "./store.interface.js";

/**
 * Shared durable-tier access for the caches: version-checked reads, and
 * CacheError downgraded to a logged miss or no-op.
 */
export abstract class VersionedCache {
  protected constructor(
    readonly version: string,
    protected readonly logger: Logger | undefined,
  ) {}

  protected async read<T>(
    store: KeyValueStore<T>,
    key: StoreKey,
  ): Promise<CacheEntry<T> | undefined> {
    let entry: CacheEntry<T> | undefined;
    try {
      entry = await store.get(key);
    } catch (error: unknown) {
      if (!(error instanceof CacheError)) throw error;
      this.logger?.warn({ err: error, partition: key.partition }, "unreadable cache entry, treating as miss");
      return undefined;
    }
    if (!entry) return undefined;
    if (entry.key !== key.key || entry.version !== this.version) {
      this.logger?.debug(
        { partition: key.partition, version: entry.version, expected: this.version },
        "stale cache entry, treating as miss",
      );
      return undefined;
    }
    return entry;
  }

  protected async write<T>(store: KeyValueStore<T>, key: StoreKey, value: T): Promise<boolean> {
    try {
      await store.put(key, {
        key: key.key,
        version: this.version,
        createdAt: new Date().toISOString(),
        value,
      });
      return true;
    } catch (error: unknown) {
      if (!(error instanceof CacheError)) throw error;
      this.logger?.error({ err: error, partition: key.partition }, "cache write failed");
      return false;
    }
  }

  protected async remove(op: () => Promise<void>, context: Record<string, unknown>): Promise<void> {
    try {
      await op();
    } catch (error: unknown) {
      if (!(error instanceof CacheError)) throw error;
      this.logger?.error({ err: error, ...context }, "cache removal failed");
    }
  }
}
