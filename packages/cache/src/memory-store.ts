import type { CacheEntry, StoreKey } from "@docseek/types";
import type { KeyValueStore } from "./store.interface.js";

/** Non-persistent store for runs with persistence turned off, and for tests. */
export class MemoryStore<T> implements KeyValueStore<T> {
  private readonly partitions = new Map<string, Map<string, CacheEntry<T>>>();

  constructor(readonly namespace: string) {}

  async get(key: StoreKey): Promise<CacheEntry<T> | undefined> {
    return this.partitions.get(key.partition)?.get(key.key);
  }

  async put(key: StoreKey, entry: CacheEntry<T>): Promise<void> {
    const partition = this.partitions.get(key.partition) ?? new Map<string, CacheEntry<T>>();
    partition.set(key.key, entry);
    this.partitions.set(key.partition, partition);
  }

  async delete(key: StoreKey): Promise<void> {
    this.partitions.get(key.partition)?.delete(key.key);
  }

  async list(partition: string): Promise<CacheEntry<T>[]> {
    return [...(this.partitions.get(partition)?.values() ?? [])];
  }

  async deletePartition(partition: string): Promise<void> {
    this.partitions.delete(partition);
  }

  async clear(): Promise<void> {
    this.partitions.clear();
  }

  get size(): number {
    let total = 0;
    for (const partition of this.partitions.values()) total += partition.size;
    return total;
  }
}
