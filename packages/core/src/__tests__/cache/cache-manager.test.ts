/**
 * Cache Manager Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { CacheManager } from '../../cache/cache-manager.js';
import { buildCacheKey, normalizeOptions } from '../../cache/cache-key.js';
import { MemoryCacheStore } from '../../cache/memory-cache-store.js';
import type { CacheStore } from '../../cache/types.js';
import { createMemoryLogger } from '../../logging/logger.js';
import type { CacheEntry } from '../../types.js';
import { FakeClock } from '../support/fakes.js';

function entry(content: string): CacheEntry {
  return {
    content,
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15, cachedTokens: 0, reasoningTokens: 0 },
    cost: 0.000012,
    meta: { provider: 'openai' },
  };
}

// =============================================================================
// Key derivation
// =============================================================================

describe('buildCacheKey', () => {
  it('should not depend on option order', () => {
    const a = buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5, max_tokens: 100 });
    const b = buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { max_tokens: 100, temperature: 0.5 });

    expect(a).toBe(b);
  });

  it('should ignore options that do not change the answer', () => {
    const base = buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5 });
    const withTransport = buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', {
      temperature: 0.5,
      stream: true,
      timeout: 30,
      async: false,
    });

    expect(withTransport).toBe(base);
  });

  it('should change with sampling options, prompt and system prompt', () => {
    const base = buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5 });

    expect(buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.6 })).not.toBe(base);
    expect(buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi!', { temperature: 0.5 })).not.toBe(base);
    expect(buildCacheKey('genai_cache', 'openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5 }, 'Be brief')).not.toBe(base);
  });

  it('should prefix the key with provider and model', () => {
    const key = buildCacheKey('genai_cache', 'claude', 'claude-3-5-haiku', 'Hi', {});

    expect(key).toMatch(/^genai_cache:claude:claude-3-5-haiku:[0-9a-f]{64}$/);
  });
});

describe('normalizeOptions', () => {
  it('should sort keys and drop undefined and transport options', () => {
    const normalized = normalizeOptions({ top_p: 1, stream: true, temperature: undefined, stop: { b: 2, a: 1 } });

    expect(Object.keys(normalized)).toEqual(['stop', 'top_p']);
    expect(Object.keys(normalized['stop'] as object)).toEqual(['a', 'b']);
  });
});

// =============================================================================
// CacheManager
// =============================================================================

describe('CacheManager', () => {
  let clock: FakeClock;
  let store: MemoryCacheStore;
  let cache: CacheManager;

  beforeEach(() => {
    clock = new FakeClock();
    store = new MemoryCacheStore(clock);
    cache = new CacheManager({ store });
  });

  it('should return a stored entry for the same request', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5 }, entry('Hello!'));

    const hit = await cache.get('openai', 'gpt-4.1-mini', 'Hi', { temperature: 0.5 });

    expect(hit).toEqual(entry('Hello!'));
  });

  it('should keep entries apart by system prompt', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('formal'), undefined, 'Be formal');

    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {}, 'Be casual')).toBeUndefined();
    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {}, 'Be formal')).toEqual(entry('formal'));
  });

  it('should expire entries after their TTL', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('Hello!'), 60);

    clock.advance(59_999);
    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {})).toBeDefined();

    clock.advance(1);
    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {})).toBeUndefined();
  });

  it('should flush entries by provider tag', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'));
    await cache.put('claude', 'claude-3-5-haiku', 'Hi', {}, entry('b'));

    await cache.flushProvider('openai');

    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {})).toBeUndefined();
    expect(await cache.get('claude', 'claude-3-5-haiku', 'Hi', {})).toEqual(entry('b'));
  });

  it('should flush entries by model and by provider-model tag', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'));
    await cache.put('openai', 'gpt-4o', 'Hi', {}, entry('b'));

    await cache.flushModel('gpt-4o');
    expect(store.size).toBe(1);

    await cache.flushProviderModel('openai', 'gpt-4.1-mini');
    expect(store.size).toBe(0);
  });

  it('should clear everything when invalidated without a tag', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'));
    await cache.put('gemini', 'gemini-2.0-flash', 'Hi', {}, entry('b'));

    await cache.invalidate();

    expect(store.size).toBe(0);
  });

  it('should forget a single entry', async () => {
    await cache.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'));
    await cache.put('openai', 'gpt-4.1-mini', 'Bye', {}, entry('b'));

    await cache.forget('openai', 'gpt-4.1-mini', 'Hi', {});

    expect(await cache.get('openai', 'gpt-4.1-mini', 'Hi', {})).toBeUndefined();
    expect(await cache.get('openai', 'gpt-4.1-mini', 'Bye', {})).toEqual(entry('b'));
  });

  it('should neither read nor write when disabled', async () => {
    const disabled = new CacheManager({ store, enabled: false });

    await disabled.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'));

    expect(store.size).toBe(0);
    expect(await disabled.get('openai', 'gpt-4.1-mini', 'Hi', {})).toBeUndefined();
    expect(disabled.getStats().enabled).toBe(false);
  });

  it('should compute the hit rate from recorded lookups', () => {
    cache.recordHit();
    cache.recordHit();
    cache.recordHit();
    cache.recordMiss();

    expect(cache.getStats()).toEqual({
      enabled: true,
      ttl: 3600,
      prefix: 'genai_cache',
      hits: 3,
      misses: 1,
      hitRate: 0.75,
    });

    cache.resetStats();
    expect(cache.getStats().hitRate).toBe(0);
  });

  it('should treat a failing store as a miss and log a warning', async () => {
    const failing: CacheStore = {
      get: vi.fn().mockRejectedValue(new Error('connection refused')),
      set: vi.fn().mockRejectedValue(new Error('connection refused')),
      delete: vi.fn(),
      flushTags: vi.fn(),
      clear: vi.fn(),
    };
    const logger = createMemoryLogger();
    const manager = new CacheManager({ store: failing, logger });

    await expect(manager.get('openai', 'gpt-4.1-mini', 'Hi', {})).resolves.toBeUndefined();
    await expect(manager.put('openai', 'gpt-4.1-mini', 'Hi', {}, entry('a'))).resolves.toBeUndefined();

    expect(logger.records.map((record) => [record.level, record.message])).toEqual([
      ['warn', 'Cache read failed, continuing without cache: connection refused'],
      ['warn', 'Cache write failed: connection refused'],
    ]);
  });
});
