import type { CacheEntry, StoreKey } from "@docseek/types";

/**
 * Durable tier behind the in-memory caches. Implementations raise
 * CacheError for unreadable, corrupt or unwritable entries.
 */
export interface KeyValueStore<T> {
  readonly namespace: string;
  get(key: StoreKey): Promise<CacheEntry<T> | undefined>;
  put(key: StoreKey, entry: CacheEntry<T>): Promise<void>;
  delete(key: StoreKey): Promise<void>;
  /** Every entry of one partition, in no particular order. */
  list(partition: string): Promise<CacheEntry<T>[]>;
  /** Remove every entry of one partition (one document). */
  deletePartition(partition: string): Promise<void>;
  clear(): Promise<void>;
}
