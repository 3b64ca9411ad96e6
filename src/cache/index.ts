export type { CacheEntry, CacheSetOptions, CacheStore } from './types.js';
export { isCacheStore } from './types.js';
export { MemoryCacheStore } from './memory.js';
export type { MemoryCacheStoreOptions } from './memory.js';
