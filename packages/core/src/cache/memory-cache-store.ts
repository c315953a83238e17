/**
 * In-memory cache store with TTL expiry and a tag index.
 *
 * Expired entries are dropped when read, and swept from the whole store on
 * writes at most once per sweep interval.
 */

import { EXPIRED_SWEEP_INTERVAL_MS } from '../constants.js';
import { systemClock, type Clock, type CacheEntry } from '../types.js';
import type { CacheStore } from './types.js';

interface StoredEntry {
  value: CacheEntry;
  expiresAt: number;
  tags: readonly string[];
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly tagIndex = new Map<string, Set<string>>();
  private nextSweepAt = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.clock.now()) {
      this.remove(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  async set(key: string, value: CacheEntry, ttlSeconds: number, tags: readonly string[]): Promise<void> {
    this.sweepExpired();
    this.remove(key);
    this.entries.set(key, {
      value: structuredClone(value),
      expiresAt: this.clock.now() + ttlSeconds * 1000,
      tags: [...tags],
    });
    for (const tag of tags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }
  }

  async delete(key: string): Promise<void> {
    this.remove(key);
  }

  async flushTags(tags: readonly string[]): Promise<void> {
    for (const tag of tags) {
      for (const key of this.tagIndex.get(tag) ?? []) {
        this.remove(key);
      }
      this.tagIndex.delete(tag);
    }
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.tagIndex.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private sweepExpired(): void {
    const now = this.clock.now();
    if (now < this.nextSweepAt) {
      return;
    }
    this.nextSweepAt = now + EXPIRED_SWEEP_INTERVAL_MS;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.remove(key);
      }
    }
  }

  private remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) {
      return;
    }
    this.entries.delete(key);
    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag);
      keys?.delete(key);
      if (keys?.size === 0) {
        this.tagIndex.delete(tag);
      }
    }
  }
}
