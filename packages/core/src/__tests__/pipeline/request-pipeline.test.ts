/**
 * Request Pipeline Tests
 *
 * Runs the real collaborators end to end with a stubbed fetch.
 */

import { describe, it, expect, vi } from 'vitest';
import { CostRegistry } from '@promptgate/cost-registry';

import { CacheManager } from '../../cache/cache-manager.js';
import { MemoryCacheStore } from '../../cache/memory-cache-store.js';
import { ConfigurationError, RateLimitExceededError, RetriesExhaustedError } from '../../errors.js';
import { createMemoryLogger } from '../../logging/logger.js';
import { InMemoryRequestLogger, type RequestLogger } from '../../logging/request-logger.js';
import { RequestPipeline } from '../../pipeline/request-pipeline.js';
import { InMemoryPresetRepository } from '../../presets/preset-repository.js';
import { ProviderDispatcher, StaticProviderConfigs } from '../../providers/dispatcher.js';
import { MemoryCounterStore } from '../../rate-limit/memory-counter-store.js';
import { RateLimiter } from '../../rate-limit/rate-limiter.js';
import type { RateLimitRules } from '../../rate-limit/types.js';
import { ConfigResolver } from '../../request/config-resolver.js';
import { RetryController } from '../../retry/retry-controller.js';
import type { SleepFn } from '../../utils/sleep.js';
import { chatCompletion, createFetchMock, FakeClock, jsonResponse } from '../support/fakes.js';

interface HarnessOptions {
  rules?: RateLimitRules;
  requestLogger?: RequestLogger;
  cacheEnabled?: boolean;
  dedupeInFlight?: boolean;
}

function createHarness(options: HarnessOptions = {}) {
  const clock = new FakeClock();
  const fetchMock = createFetchMock();
  const sleep = vi.fn<Parameters<SleepFn>, ReturnType<SleepFn>>().mockResolvedValue(undefined);
  const logger = createMemoryLogger();
  const cache = new CacheManager({
    store: new MemoryCacheStore(clock),
    enabled: options.cacheEnabled ?? true,
  });
  const rateLimiter = new RateLimiter({
    store: new MemoryCounterStore(clock),
    rules: options.rules ?? { default: {} },
    clock,
  });

  const pipeline = new RequestPipeline({
    resolver: new ConfigResolver({ presets: new InMemoryPresetRepository() }),
    cache,
    rateLimiter,
    dispatcher: new ProviderDispatcher({
      configs: new StaticProviderConfigs({ openai: { apiKey: 'test-key', headers: {}, timeoutMs: 1000 } }),
      fetch: fetchMock,
      clock,
    }),
    retry: new RetryController({ sleep }),
    costs: CostRegistry.default(),
    logger,
    requestLogger: options.requestLogger,
    clock,
    dedupeInFlight: options.dedupeInFlight,
  });

  return { pipeline, clock, fetchMock, sleep, logger, cache, rateLimiter };
}

function reply(content = 'Hi there') {
  return async () => jsonResponse(chatCompletion(content));
}

describe('RequestPipeline', () => {
  // ===========================================================================
  // Happy path and caching
  // ===========================================================================

  describe('caching', () => {
    it('should call the provider once and serve the repeat from cache', async () => {
      const { pipeline, clock, fetchMock, cache } = createHarness();
      fetchMock.mockImplementation(async () => {
        clock.advance(250);
        return jsonResponse(chatCompletion('Hi there'));
      });

      const first = await pipeline.execute({ prompt: 'Hello' });
      const second = await pipeline.execute({ prompt: 'Hello' });

      expect(first).toEqual({
        ok: true,
        response: {
          content: 'Hi there',
          usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15, cachedTokens: 0, reasoningTokens: 0 },
          cost: 0.000012,
          meta: {
            id: 'chatcmpl-test',
            model: 'gpt-4.1-mini',
            finishReason: 'stop',
            provider: 'openai',
            currency: 'USD',
            priced: true,
          },
          cached: false,
          responseTimeMs: 250,
        },
      });
      expect(second.ok).toBe(true);
      expect(second.response.cached).toBe(true);
      expect(second.response.content).toBe('Hi there');
      expect(second.response.responseTimeMs).toBe(0);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1 });
    });

    it('should call the provider again when options differ', async () => {
      const { pipeline, fetchMock } = createHarness();
      fetchMock.mockImplementation(reply());

      await pipeline.execute({ prompt: 'Hello', options: { temperature: 0.1 } });
      await pipeline.execute({ prompt: 'Hello', options: { temperature: 0.2 } });

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should not count lookups when the cache is disabled', async () => {
      const { pipeline, fetchMock, cache } = createHarness({ cacheEnabled: false });
      fetchMock.mockImplementation(reply());

      await pipeline.execute({ prompt: 'Hello' });
      await pipeline.execute({ prompt: 'Hello' });

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(cache.getStats()).toMatchObject({ hits: 0, misses: 0 });
    });

    it('should record actual usage with the rate limiter', async () => {
      const { pipeline, fetchMock, rateLimiter } = createHarness();
      fetchMock.mockImplementation(reply());

      await pipeline.execute({ prompt: 'Hello' }, { callerId: 'team-a' });

      const stats = await rateLimiter.getStats('openai', 'gpt-4.1-mini', 'team-a');
      expect(stats.current).toEqual({ requestsPerMinute: 1, tokensPerMinute: 15, requestsPerDay: 1 });
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('should deny requests over the rate limit without calling the provider', async () => {
      const { pipeline, fetchMock } = createHarness({ rules: { default: { requestsPerMinute: 1 } } });
      fetchMock.mockImplementation(reply());

      await pipeline.execute({ prompt: 'first' });
      const denied = await pipeline.execute({ prompt: 'second' });

      expect(denied.ok).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      if (!denied.ok) {
        expect(denied.error).toBeInstanceOf(RateLimitExceededError);
      }
      expect(denied.response).toEqual({
        content: '',
        usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0, cachedTokens: 0, reasoningTokens: 0 },
        cost: 0,
        meta: { kind: 'rate_limit' },
        cached: false,
        responseTimeMs: 0,
        error: 'Rate limit exceeded (requestsPerMinute); resets at 2025-01-15T12:01:00.000Z',
      });
    });

    it('should retry throttled calls and succeed', async () => {
      const { pipeline, fetchMock, sleep, logger } = createHarness();
      fetchMock
        .mockImplementationOnce(async () => jsonResponse({ error: 'busy' }, { status: 429 }))
        .mockImplementation(reply('Second time lucky'));

      const result = await pipeline.execute({ prompt: 'Hello' });

      expect(result.ok).toBe(true);
      expect(result.response.content).toBe('Second time lucky');
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
      expect(logger.records.filter((record) => record.level === 'warn').map((record) => record.message)).toEqual([
        'Retrying openai/gpt-4.1-mini after attempt 1: openai returned HTTP 429',
      ]);
    });

    it('should report exhausted retries', async () => {
      const { pipeline, fetchMock, rateLimiter } = createHarness();
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const result = await pipeline.execute({ prompt: 'Hello' });

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RetriesExhaustedError);
        expect(result.error.kind).toBe('exhausted');
      }
      expect(result.response.error).toBe(
        'Maximum retry attempts exceeded after 3 attempts: Could not reach openai: fetch failed'
      );
      expect((await rateLimiter.getStats('openai', 'gpt-4.1-mini')).current.requestsPerMinute).toBe(0);
    });

    it('should fail fast on client errors and cache nothing', async () => {
      const { pipeline, fetchMock } = createHarness();
      fetchMock
        .mockImplementationOnce(async () => jsonResponse({ error: 'bad request' }, { status: 400 }))
        .mockImplementation(reply());

      const failed = await pipeline.execute({ prompt: 'Hello' });
      const retried = await pipeline.execute({ prompt: 'Hello' });

      expect(failed.response.meta).toEqual({ kind: 'client' });
      expect(retried.ok).toBe(true);
      expect(retried.response.cached).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should throw the typed error from request()', async () => {
      const { pipeline } = createHarness();

      await expect(pipeline.request({ prompt: '' })).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  // ===========================================================================
  // Request logging
  // ===========================================================================

  describe('request logging', () => {
    it('should log every call once, successful or not', async () => {
      const requestLogger = new InMemoryRequestLogger();
      const { pipeline, fetchMock } = createHarness({ requestLogger });
      fetchMock.mockImplementation(reply());

      await pipeline.execute({ prompt: 'Hello' });
      await pipeline.execute({ prompt: 'Hello' });
      await pipeline.execute({ prompt: ' ', provider: 'claude' });

      expect(requestLogger.entries.map((entry) => [entry.provider, entry.response.cached, entry.error?.kind])).toEqual([
        ['openai', false, undefined],
        ['openai', true, undefined],
        ['claude', false, 'configuration'],
      ]);
      expect(requestLogger.summary()).toMatchObject({ total: 3, errors: 1, cacheHits: 1, totalTokens: 30 });
    });

    it('should keep going when the request logger throws', async () => {
      const { pipeline, fetchMock, logger } = createHarness({
        requestLogger: {
          log: () => {
            throw new Error('disk full');
          },
        },
      });
      fetchMock.mockImplementation(reply());

      const result = await pipeline.execute({ prompt: 'Hello' });

      expect(result.ok).toBe(true);
      expect(logger.records.find((record) => record.level === 'error')?.message).toBe('Request logger failed: disk full');
    });
  });

  // ===========================================================================
  // In-flight de-duplication
  // ===========================================================================

  describe('in-flight de-duplication', () => {
    function gatedReply() {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      return {
        release: () => release(),
        respond: async () => {
          await gate;
          return jsonResponse(chatCompletion('Shared'));
        },
      };
    }

    it('should share one upstream call between identical concurrent requests', async () => {
      const { pipeline, fetchMock, rateLimiter } = createHarness({ dedupeInFlight: true });
      const gated = gatedReply();
      fetchMock.mockImplementation(gated.respond);

      const first = pipeline.execute({ prompt: 'Hello' });
      const second = pipeline.execute({ prompt: 'Hello' });
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
      gated.release();
      const [a, b] = await Promise.all([first, second]);

      expect(a.response.content).toBe('Shared');
      expect(b.response.content).toBe('Shared');
      expect(b.response.usage).not.toBe(a.response.usage);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect((await rateLimiter.getStats('openai', 'gpt-4.1-mini')).current.requestsPerMinute).toBe(1);
    });

    it('should call upstream for each request when turned off', async () => {
      const { pipeline, fetchMock } = createHarness();
      const gated = gatedReply();
      fetchMock.mockImplementation(gated.respond);

      const first = pipeline.execute({ prompt: 'Hello' });
      const second = pipeline.execute({ prompt: 'Hello' });
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(2));
      gated.release();
      await Promise.all([first, second]);

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });
});
