import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { StorageError } from "./errors.js";
import type { CacheEntry } from "./types.js";
import {
  ensureDirectory,
  errorMessage,
  isNodeError,
  keyToFileName,
  logger,
  writeFileAtomic,
} from "./utils.js";

/**
 * Fallible key-value persistence behind the document cache. Every method
 * rejects with a `StorageError` when the backing storage fails.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  put(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  /** All stored entries, expired or not. */
  entries(): Promise<CacheEntry[]>;
}

export class MemoryCacheStore implements CacheStore {
  private readonly data = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.data.get(key);
  }

  async put(entry: CacheEntry): Promise<void> {
    this.data.set(entry.key, { ...entry });
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async entries(): Promise<CacheEntry[]> {
    return Array.from(this.data.values());
  }
}

const cacheEntrySchema = z.object({
  key: z.string(),
  content: z.string(),
  storedAt: z.number(),
  ttlSeconds: z.number().int().nonnegative(),
});

/**
 * Stores each entry as a JSON file named after the SHA-256 of its key, so
 * entries survive restarts.
 */
export class FileCacheStore implements CacheStore {
  constructor(readonly directory: string) {}

  private pathFor(key: string): string {
    return path.join(this.directory, keyToFileName(key));
  }

  private async readEntry(filePath: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf-8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw new StorageError(
        `Failed to read cache file ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new StorageError(`Corrupt cache file ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const parsed = cacheEntrySchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Corrupt cache file ${filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = await this.readEntry(this.pathFor(key));
    return entry && entry.key === key ? entry : undefined;
  }

  async put(entry: CacheEntry): Promise<void> {
    try {
      await writeFileAtomic(this.pathFor(entry.key), JSON.stringify(entry));
    } catch (error: unknown) {
      throw new StorageError(
        `Failed to write cache entry for ${entry.key}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.promises.rm(this.pathFor(key), { force: true });
    } catch (error: unknown) {
      throw new StorageError(
        `Failed to delete cache entry for ${key}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async entries(): Promise<CacheEntry[]> {
    let names: string[];
    try {
      await ensureDirectory(this.directory);
      names = await fs.promises.readdir(this.directory);
    } catch (error: unknown) {
      throw new StorageError(
        `Failed to list cache directory ${this.directory}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const entries: CacheEntry[] = [];
    for (const name of names.filter((n) => n.endsWith(".json"))) {
      try {
        const entry = await this.readEntry(path.join(this.directory, name));
        if (entry) {
          entries.push(entry);
        }
      } catch (error: unknown) {
        logger.warn("Cache", `Skipping unreadable cache file ${name}: ${errorMessage(error)}`);
      }
    }
    return entries;
  }
}

export interface DocumentCacheOptions {
  ttlSeconds: number;
  /** Epoch milliseconds; replaced in tests. */
  now?: () => number;
}

export function isEntryValid(entry: CacheEntry, now: number): boolean {
  return now < entry.storedAt + entry.ttlSeconds * 1000;
}

/**
 * Read-through TTL cache with single-flight population.
 *
 * Concurrent `getOrRender` calls for a key that has no valid entry share one
 * call of the render function and all see its result or its error. Failures
 * are never cached. Storage failures degrade to cache misses.
 */
export class DocumentCache {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(private readonly store: CacheStore, options: DocumentCacheOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
  }

  getOrRender(key: string, render: () => Promise<string>): Promise<string> {
    return this.singleFlight(key, () => this.lookupOrRender(key, render));
  }

  /**
   * Renders `key` without consulting the store and stores the result. Joins
   * an in-flight render of the same key.
   */
  refresh(key: string, render: () => Promise<string>): Promise<string> {
    return this.singleFlight(key, () => this.renderAndStore(key, render));
  }

  private singleFlight(key: string, task: () => Promise<string>): Promise<string> {
    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug("Cache", `Joining in-flight render for ${key}`);
      return pending;
    }

    const running = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, running);
    return running;
  }

  private async lookupOrRender(
    key: string,
    render: () => Promise<string>
  ): Promise<string> {
    const cached = await this.read(key);
    if (cached !== undefined) {
      logger.info("Cache", `HIT ${key}`);
      return cached;
    }

    logger.info("Cache", `MISS ${key}`);
    return this.renderAndStore(key, render);
  }

  private async renderAndStore(
    key: string,
    render: () => Promise<string>
  ): Promise<string> {
    const content = await render();
    await this.write({
      key,
      content,
      storedAt: this.now(),
      ttlSeconds: this.ttlSeconds,
    });
    return content;
  }

  private async read(key: string): Promise<string | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(key);
    } catch (error: unknown) {
      logger.error("Cache", `Read failed for ${key}, treating as miss: ${errorMessage(error)}`);
      return undefined;
    }
    if (entry && isEntryValid(entry, this.now())) {
      return entry.content;
    }
    return undefined;
  }

  private async write(entry: CacheEntry): Promise<void> {
    try {
      await this.store.put(entry);
    } catch (error: unknown) {
      logger.error("Cache", `Write failed for ${entry.key}: ${errorMessage(error)}`);
    }
  }

  async invalidate(key: string): Promise<void> {
    try {
      await this.store.delete(key);
      logger.debug("Cache", `Invalidated ${key}`);
    } catch (error: unknown) {
      logger.error("Cache", `Invalidate failed for ${key}: ${errorMessage(error)}`);
    }
  }

  /**
   * Deletes every expired entry and returns how many were removed.
   */
  async purgeExpired(): Promise<number> {
    let entries: CacheEntry[];
    try {
      entries = await this.store.entries();
    } catch (error: unknown) {
      logger.error("Cache", `Purge skipped: ${errorMessage(error)}`);
      return 0;
    }

    const now = this.now();
    let removed = 0;
    for (const entry of entries) {
      if (isEntryValid(entry, now)) {
        continue;
      }
      try {
        await this.store.delete(entry.key);
        removed++;
      } catch (error: unknown) {
        logger.error("Cache", `Purge failed for ${entry.key}: ${errorMessage(error)}`);
      }
    }
    if (removed > 0) {
      logger.info("Cache", `Purged ${removed} expired entries`);
    }
    return removed;
  }
}
