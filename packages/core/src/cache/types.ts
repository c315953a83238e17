/**
 * Cache Types
 */

import type { CacheEntry } from '../types.js';

/**
 * Cache backend. Implementations must be safe for concurrent callers.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, value: CacheEntry, ttlSeconds: number, tags: readonly string[]): Promise<void>;
  delete(key: string): Promise<void>;
  /** Delete every entry carrying any of the tags */
  flushTags(tags: readonly string[]): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheStats {
  enabled: boolean;
  ttl: number;
  prefix: string;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before any lookup */
  hitRate: number;
}
