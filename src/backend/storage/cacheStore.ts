import path from 'path';
import PQueue from 'p-queue';
import logger from '../../utils/logger';
import { readJson, writeJson } from '../../utils/fileutils';

/**
 * Checksum-aware key/value cache. An entry is only served when the caller's checksum equals the
 * checksum it was stored with, which lets metadata refreshes invalidate listings explicitly.
 */
export interface CacheStore {
  get(key: string, checksum?: string): Promise<unknown>;
  set(key: string, value: unknown, checksum?: string): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheEntry {
  value: unknown;
  checksum?: string;
  timestamp: number;
}

export class MemoryCacheStore implements CacheStore {
  protected readonly entries = new Map<string, CacheEntry>();

  async get(key: string, checksum?: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.checksum !== checksum) return undefined;
    return structuredClone(entry.value);
  }

  async set(key: string, value: unknown, checksum?: string): Promise<void> {
    this.entries.set(key, { value: structuredClone(value), checksum, timestamp: Date.now() });
    await this.persist();
  }

  async delete(key: string): Promise<void> {
    if (this.entries.delete(key)) await this.persist();
  }

  async clear(): Promise<void> {
    this.entries.clear();
    await this.persist();
  }

  protected async persist(): Promise<void> {
    // volatile
  }
}

/**
 * Cache persisted to a single JSON file of `{ value, checksum, timestamp }` entries.
 */
export class FileCacheStore extends MemoryCacheStore {
  private readonly writeQueue = new PQueue({ concurrency: 1 });

  private constructor(private readonly file: string) {
    super();
  }

  static async open(dir: string): Promise<FileCacheStore> {
    const store = new FileCacheStore(path.join(dir, 'cache.json'));
    const raw = await readJson<Record<string, CacheEntry>>(store.file);
    for (const [key, entry] of Object.entries(raw ?? {})) {
      if (entry && typeof entry === 'object' && 'value' in entry) {
        store.entries.set(key, entry);
      }
    }
    logger.info(`[FileCacheStore] Loaded ${store.entries.size} cache entries`);
    return store;
  }

  protected async persist(): Promise<void> {
    // Snapshot at write time so a queued write always carries the latest entries.
    await this.writeQueue.add(() => writeJson(this.file, Object.fromEntries(this.entries)));
  }
}
