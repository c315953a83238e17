/**
 * Cache Manager
 *
 * Response cache keyed by provider, model, prompt and the options that
 * affect the answer. Backend failures are logged and treated as a miss;
 * they never fail a request.
 */

import {
  DEFAULT_CACHE_PREFIX,
  DEFAULT_CACHE_TAGS,
  DEFAULT_CACHE_TTL_SECONDS,
} from '../constants.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { CacheEntry, RequestOptions } from '../types.js';
import { buildCacheKey, buildCacheTags } from './cache-key.js';
import type { CacheStats, CacheStore } from './types.js';

export interface CacheManagerOptions {
  store: CacheStore;
  /** When false, lookups miss and writes are skipped (default: true) */
  enabled?: boolean;
  /** Entry lifetime in seconds */
  ttl?: number;
  prefix?: string;
  /** Tags added to every entry */
  tags?: readonly string[];
  logger?: Logger;
}

export class CacheManager {
  private readonly store: CacheStore;
  private readonly enabled: boolean;
  private readonly ttl: number;
  private readonly prefix: string;
  private readonly baseTags: readonly string[];
  private readonly logger: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheManagerOptions) {
    this.store = options.store;
    this.enabled = options.enabled ?? true;
    this.ttl = options.ttl ?? DEFAULT_CACHE_TTL_SECONDS;
    this.prefix = options.prefix ?? DEFAULT_CACHE_PREFIX;
    this.baseTags = options.tags ?? DEFAULT_CACHE_TAGS;
    this.logger = options.logger ?? silentLogger;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  key(
    provider: string,
    model: string,
    prompt: string,
    options: Readonly<RequestOptions>,
    systemPrompt?: string
  ): string {
    return buildCacheKey(this.prefix, provider, model, prompt, options, systemPrompt);
  }

  async get(
    provider: string,
    model: string,
    prompt: string,
    options: Readonly<RequestOptions>,
    systemPrompt?: string
  ): Promise<CacheEntry | undefined> {
    if (!this.enabled) {
      return undefined;
    }

    const key = this.key(provider, model, prompt, options, systemPrompt);
    try {
      const entry = await this.store.get(key);
      this.logger.debug(entry ? 'Cache hit' : 'Cache miss', { key });
      return entry;
    } catch (error) {
      this.logger.warn(`Cache read failed, continuing without cache: ${errorMessage(error)}`, { key });
      return undefined;
    }
  }

  async put(
    provider: string,
    model: string,
    prompt: string,
    options: Readonly<RequestOptions>,
    entry: CacheEntry,
    ttl: number = this.ttl,
    systemPrompt?: string
  ): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const key = this.key(provider, model, prompt, options, systemPrompt);
    try {
      await this.store.set(key, entry, ttl, buildCacheTags(this.baseTags, provider, model));
      this.logger.debug('Cache stored', { key, ttl });
    } catch (error) {
      this.logger.warn(`Cache write failed: ${errorMessage(error)}`, { key });
    }
  }

  /**
   * Remove one entry.
   */
  async forget(
    provider: string,
    model: string,
    prompt: string,
    options: Readonly<RequestOptions>,
    systemPrompt?: string
  ): Promise<void> {
    await this.store.delete(this.key(provider, model, prompt, options, systemPrompt));
  }

  /**
   * Flush entries carrying `tag`, or everything when no tag is given.
   */
  async invalidate(tag?: string): Promise<void> {
    if (tag === undefined) {
      await this.store.clear();
      this.logger.info('Cache cleared');
      return;
    }
    await this.store.flushTags([tag]);
    this.logger.info('Cache flushed', { tag });
  }

  flushProvider(provider: string): Promise<void> {
    return this.invalidate(`provider:${provider}`);
  }

  flushModel(model: string): Promise<void> {
    return this.invalidate(`model:${model}`);
  }

  flushProviderModel(provider: string, model: string): Promise<void> {
    return this.invalidate(`provider-model:${provider}:${model}`);
  }

  recordHit(): void {
    this.hits++;
  }

  recordMiss(): void {
    this.misses++;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      enabled: this.enabled,
      ttl: this.ttl,
      prefix: this.prefix,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
  }
}
