/**
 * Rate Limiter Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { MemoryCounterStore } from '../../rate-limit/memory-counter-store.js';
import { RateLimiter, estimateTokensByLength } from '../../rate-limit/rate-limiter.js';
import type { RateLimitRules } from '../../rate-limit/types.js';
import { createMemoryLogger } from '../../logging/logger.js';
import { FakeClock, START_TIME } from '../support/fakes.js';

function limiterWith(rules: RateLimitRules, clock: FakeClock, store = new MemoryCounterStore(clock)) {
  return new RateLimiter({ store, rules, clock });
}

describe('RateLimiter', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  // ===========================================================================
  // Requests per minute
  // ===========================================================================

  describe('requests per minute', () => {
    it('should deny the request after the limit is reached', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 5 } }, clock);

      for (let i = 0; i < 5; i++) {
        expect((await limiter.check('openai', 'gpt-4.1-mini')).allowed).toBe(true);
        await limiter.record('openai', 'gpt-4.1-mini');
      }

      const decision = await limiter.check('openai', 'gpt-4.1-mini');
      expect(decision.allowed).toBe(false);
      expect(decision.deniedBy).toBe('requestsPerMinute');
      expect(decision.remaining).toEqual({ requestsPerMinute: 0 });
      expect(decision.resetAt).toBe(START_TIME + 60_000);
    });

    it('should allow requests again in the next window', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 1 } }, clock);
      await limiter.record('openai', 'gpt-4.1-mini');

      expect((await limiter.check('openai', 'gpt-4.1-mini')).allowed).toBe(false);

      clock.advance(60_000);
      const next = await limiter.check('openai', 'gpt-4.1-mini');
      expect(next.allowed).toBe(true);
      expect(next.current.requestsPerMinute).toBe(0);
      expect(next.current.requestsPerDay).toBe(1);
      expect(next.resetAt).toBe(START_TIME + 120_000);
    });

    it('should count every concurrent record on one key', async () => {
      const limiter = limiterWith(
        { default: { requestsPerMinute: 1000, tokensPerMinute: 100_000, requestsPerDay: 1000 } },
        clock
      );

      await Promise.all(Array.from({ length: 50 }, () => limiter.record('openai', 'gpt-4.1-mini', 10)));

      const decision = await limiter.check('openai', 'gpt-4.1-mini');
      expect(decision.current).toEqual({ requestsPerMinute: 50, tokensPerMinute: 500, requestsPerDay: 50 });
    });

    it('should deny once concurrent records reach the limit', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 20 } }, clock);

      await Promise.all(Array.from({ length: 20 }, () => limiter.record('openai', 'gpt-4.1-mini')));

      const decision = await limiter.check('openai', 'gpt-4.1-mini');
      expect(decision.allowed).toBe(false);
      expect(decision.current.requestsPerMinute).toBe(20);
      expect(decision.remaining).toEqual({ requestsPerMinute: 0 });
    });

    it('should not change counters when checking', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 1 } }, clock);

      await limiter.check('openai', 'gpt-4.1-mini');
      await limiter.check('openai', 'gpt-4.1-mini');

      expect((await limiter.check('openai', 'gpt-4.1-mini')).current.requestsPerMinute).toBe(0);
    });
  });

  // ===========================================================================
  // Tokens per minute
  // ===========================================================================

  describe('tokens per minute', () => {
    it('should deny when recorded plus estimated tokens exceed the limit', async () => {
      const limiter = limiterWith({ default: { tokensPerMinute: 100 } }, clock);
      await limiter.record('openai', 'gpt-4.1-mini', 80);

      const atLimit = await limiter.check('openai', 'gpt-4.1-mini', 20);
      expect(atLimit.allowed).toBe(true);
      expect(atLimit.remaining.tokensPerMinute).toBe(20);

      const over = await limiter.check('openai', 'gpt-4.1-mini', 21);
      expect(over.allowed).toBe(false);
      expect(over.deniedBy).toBe('tokensPerMinute');
    });
  });

  // ===========================================================================
  // Requests per day
  // ===========================================================================

  describe('requests per day', () => {
    it('should reset at the next UTC date', async () => {
      const limiter = limiterWith({ default: { requestsPerDay: 2 } }, clock);
      await limiter.record('gemini', 'gemini-2.0-flash');
      await limiter.record('gemini', 'gemini-2.0-flash');

      const denied = await limiter.check('gemini', 'gemini-2.0-flash');
      expect(denied.allowed).toBe(false);
      expect(denied.deniedBy).toBe('requestsPerDay');

      clock.advance(12 * 60 * 60 * 1000);
      expect((await limiter.check('gemini', 'gemini-2.0-flash')).allowed).toBe(true);
    });
  });

  // ===========================================================================
  // Scoping and precedence
  // ===========================================================================

  describe('limit resolution', () => {
    const rules: RateLimitRules = {
      default: { requestsPerMinute: 100 },
      providers: { openai: { requestsPerMinute: 10 } },
      models: { 'gpt-4o': { requestsPerMinute: 3 } },
    };

    it('should prefer model, then provider, then default limits', () => {
      const limiter = limiterWith(rules, clock);

      expect(limiter.resolveLimits('openai', 'gpt-4o')).toEqual({ requestsPerMinute: 3 });
      expect(limiter.resolveLimits('openai', 'gpt-4.1-mini')).toEqual({ requestsPerMinute: 10 });
      expect(limiter.resolveLimits('claude', 'claude-3-5-haiku')).toEqual({ requestsPerMinute: 100 });
    });

    it('should count callers separately', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 1 } }, clock);
      await limiter.record('openai', 'gpt-4.1-mini', 0, 'alice');

      expect((await limiter.check('openai', 'gpt-4.1-mini', 0, 'alice')).allowed).toBe(false);
      expect((await limiter.check('openai', 'gpt-4.1-mini', 0, 'bob')).allowed).toBe(true);
    });

    it('should count models separately', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 1 } }, clock);
      await limiter.record('openai', 'gpt-4.1-mini');

      expect((await limiter.check('openai', 'gpt-4o')).allowed).toBe(true);
    });

    it('should treat a zero limit as unlimited', async () => {
      const limiter = limiterWith({ default: { requestsPerMinute: 0, requestsPerDay: 1 } }, clock);

      const decision = await limiter.check('openai', 'gpt-4.1-mini');

      expect(decision.limits).toEqual({ requestsPerDay: 1 });
      expect(decision.remaining).toEqual({ requestsPerDay: 1 });
    });
  });

  // ===========================================================================
  // Housekeeping
  // ===========================================================================

  it('should allow everything and record nothing when disabled', async () => {
    const store = new MemoryCounterStore(clock);
    const limiter = new RateLimiter({ store, rules: { default: { requestsPerMinute: 1 } }, enabled: false, clock });

    await limiter.record('openai', 'gpt-4.1-mini', 500);
    const decision = await limiter.check('openai', 'gpt-4.1-mini', 500);

    expect(decision.allowed).toBe(true);
    expect(decision.limits).toEqual({});
    expect(store.size).toBe(0);
  });

  it('should clear the windows of a scope on reset', async () => {
    const limiter = limiterWith({ default: { requestsPerMinute: 1 } }, clock);
    await limiter.record('openai', 'gpt-4.1-mini', 40);

    await limiter.reset('openai', 'gpt-4.1-mini');

    const stats = await limiter.getStats('openai', 'gpt-4.1-mini');
    expect(stats.current).toEqual({ requestsPerMinute: 0, tokensPerMinute: 0, requestsPerDay: 0 });
  });

  it('should report current usage through getStats', async () => {
    const limiter = limiterWith({ default: { requestsPerMinute: 10, tokensPerMinute: 1000 } }, clock);
    await limiter.record('openai', 'gpt-4.1-mini', 42);

    expect(await limiter.getStats('openai', 'gpt-4.1-mini')).toEqual({
      current: { requestsPerMinute: 1, tokensPerMinute: 42, requestsPerDay: 1 },
      limits: { requestsPerMinute: 10, tokensPerMinute: 1000 },
      resetAt: START_TIME + 60_000,
    });
  });

  it('should log a warning when denying', async () => {
    const logger = createMemoryLogger();
    const store = new MemoryCounterStore(clock);
    const limiter = new RateLimiter({ store, rules: { default: { requestsPerMinute: 1 } }, clock, logger });
    await limiter.record('openai', 'gpt-4.1-mini');

    await limiter.check('openai', 'gpt-4.1-mini');

    expect(logger.records).toHaveLength(1);
    expect(logger.records[0]?.level).toBe('warn');
    expect(logger.records[0]?.message).toBe('Rate limit exceeded');
    expect(logger.records[0]?.context?.['deniedBy']).toBe('requestsPerMinute');
  });

  it('should estimate tokens from text length', () => {
    expect(estimateTokensByLength('abcdefghi')).toBe(3);
    expect(estimateTokensByLength('')).toBe(0);
  });
});
