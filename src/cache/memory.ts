import type { CacheEntry, CacheSetOptions, CacheStore } from './types.js';

/**
 * Options for MemoryCacheStore.
 */
export interface MemoryCacheStoreOptions {
  /**
   * Default time-to-live in seconds when `set` is called without one.
   * @default 300 (5 minutes)
   */
  defaultTtl?: number;
}

/**
 * In-memory cache store. Expired entries are dropped on read.
 *
 * Note: This store is not shared across processes/instances.
 *
 * @example
 * ```ts
 * import { configure, MemoryCacheStore } from 'hono-inbound-logger';
 *
 * configure({ cache: new MemoryCacheStore({ defaultTtl: 30 }) });
 * ```
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry<unknown>>();
  private defaultTtl: number;

  constructor(options?: MemoryCacheStoreOptions) {
    this.defaultTtl = options?.defaultTtl ?? 300;
  }

  async get<T>(key: string): Promise<CacheEntry<T> | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt && entry.expiresAt.getTime() <= Date.now()) {
      this.entries.delete(key);
      return null;
    }

    // Values are only ever written through set<T> under the same key
    return entry as CacheEntry<T>;
  }

  async set<T>(key: string, data: T, options?: CacheSetOptions): Promise<void> {
    const ttl = options?.ttl ?? this.defaultTtl;
    const now = new Date();
    this.entries.set(key, {
      data,
      createdAt: now,
      expiresAt: ttl > 0 ? new Date(now.getTime() + ttl * 1000) : null,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Get the number of entries (for debugging/monitoring).
   */
  getSize(): number {
    return this.entries.size;
  }
}
