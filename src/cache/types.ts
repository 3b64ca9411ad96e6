/**
 * Cache entry stored in the cache storage.
 */
export interface CacheEntry<T = unknown> {
  data: T;
  createdAt: Date;
  expiresAt: Date | null;
}

/**
 * Options for setting cache entries.
 */
export interface CacheSetOptions {
  /** Time-to-live in seconds. */
  ttl?: number;
}

/**
 * Cache handle injected through configuration.
 * Implement this interface to back it with Redis, an LRU, or the host's own cache.
 */
export interface CacheStore {
  /**
   * Get a cached entry by key.
   * @returns The cached entry or null if not found/expired.
   */
  get<T>(key: string): Promise<CacheEntry<T> | null>;

  /**
   * Set a cache entry.
   */
  set<T>(key: string, data: T, options?: CacheSetOptions): Promise<void>;

  /**
   * Delete a cache entry by key.
   * @returns True if the entry was deleted.
   */
  delete(key: string): Promise<boolean>;

  /**
   * Clear all cache entries.
   */
  clear(): Promise<void>;
}

/**
 * Structural check used when validating configuration input.
 */
export function isCacheStore(value: unknown): value is CacheStore {
  if (value === null || typeof value !== 'object') return false;
  return (
    'get' in value && typeof value.get === 'function' &&
    'set' in value && typeof value.set === 'function' &&
    'delete' in value && typeof value.delete === 'function' &&
    'clear' in value && typeof value.clear === 'function'
  );
}
