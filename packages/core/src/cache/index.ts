/**
 * Cache Module
 */

export type { CacheStore, CacheStats } from './types.js';
export { CacheManager } from './cache-manager.js';
export type { CacheManagerOptions } from './cache-manager.js';
export { MemoryCacheStore } from './memory-cache-store.js';
export { buildCacheKey, buildCacheTags, normalizeOptions } from './cache-key.js';
