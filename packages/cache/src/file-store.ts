import { createHash, randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CacheError } from "@docseek/errors";
import type { CacheEntry, StoreKey } from "@docseek/types";
import type { KeyValueStore } from "./store.interface.js";

const envelopeSchema = z.object({
  key: z.string(),
  version: z.string(),
  createdAt: z.string(),
  value: z.unknown(),
});

export interface FileStoreOptions<T> {
  baseDir: string;
  namespace: string;
  /** Validates the entry value on every read. */
  schema: z.ZodType<T>;
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}

/**
 * One JSON file per entry:
 * `<baseDir>/<namespace>/<sha256(partition)>/<sha256(key)>.json`.
 * Writes go to a unique temp file that is renamed into place.
 */
export class FileStore<T> implements KeyValueStore<T> {
  readonly namespace: string;
  private readonly root: string;
  private readonly schema: z.ZodType<T>;

  constructor(options: FileStoreOptions<T>) {
    this.namespace = options.namespace;
    this.root = path.join(options.baseDir, options.namespace);
    this.schema = options.schema;
  }

  partitionDir(partition: string): string {
    return path.join(this.root, sha256(partition));
  }

  pathFor(key: StoreKey): string {
    return path.join(this.partitionDir(key.partition), `${sha256(key.key)}.json`);
  }

  async get(key: StoreKey): Promise<CacheEntry<T> | undefined> {
    return this.load(this.pathFor(key));
  }

  async list(partition: string): Promise<CacheEntry<T>[]> {
    const dir = this.partitionDir(partition);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error: unknown) {
      if (isNotFound(error)) return [];
      throw new CacheError(`Failed to list cache partition ${dir}`, "read", {
        cause: error,
        details: { namespace: this.namespace },
      });
    }

    const entries: CacheEntry<T>[] = [];
    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const entry = await this.load(path.join(dir, name));
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async put(key: StoreKey, entry: CacheEntry<T>): Promise<void> {
    const file = this.pathFor(key);
    const tmp = `${file}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(file), { recursive: true });
    } catch (error: unknown) {
      throw new CacheError(`Failed to create cache directory for ${file}`, "write", {
        cause: error,
        details: { namespace: this.namespace },
      });
    }

    try {
      await writeFile(tmp, JSON.stringify(entry), "utf-8");
      await rename(tmp, file);
    } catch (error: unknown) {
      await rm(tmp, { force: true });
      throw new CacheError(`Failed to write cache entry ${file}`, "write", {
        cause: error,
        details: { namespace: this.namespace },
      });
    }
  }

  async delete(key: StoreKey): Promise<void> {
    await this.remove(this.pathFor(key), "delete");
  }

  async deletePartition(partition: string): Promise<void> {
    await this.remove(this.partitionDir(partition), "delete");
  }

  async clear(): Promise<void> {
    await this.remove(this.root, "clear");
  }

  private async load(file: string): Promise<CacheEntry<T> | undefined> {
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error: unknown) {
      if (isNotFound(error)) return undefined;
      throw new CacheError(`Failed to read cache entry ${file}`, "read", {
        cause: error,
        details: { namespace: this.namespace },
      });
    }

    try {
      const envelope = envelopeSchema.parse(JSON.parse(raw));
      return {
        key: envelope.key,
        version: envelope.version,
        createdAt: envelope.createdAt,
        value: this.schema.parse(envelope.value),
      };
    } catch (error: unknown) {
      throw new CacheError(`Corrupt cache entry ${file}`, "read", {
        cause: error,
        details: { namespace: this.namespace },
      });
    }
  }

  private async remove(target: string, operation: "delete" | "clear"): Promise<void> {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (error: unknown) {
      throw new CacheError(`Failed to remove ${target}`, operation, {
        cause: error,
        details: { namespace: this.namespace },
      });
    }
  }
}
