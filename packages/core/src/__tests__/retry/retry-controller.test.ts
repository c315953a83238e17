/**
 * Retry Controller Tests
 */

import { describe, it, expect, vi } from 'vitest';

import {
  ConfigurationError,
  ProviderRequestError,
  RequestCancelledError,
  RequestTimeoutError,
  RetriesExhaustedError,
} from '../../errors.js';
import { RetryController } from '../../retry/retry-controller.js';
import type { SleepFn } from '../../utils/sleep.js';

function createSleep() {
  return vi.fn<Parameters<SleepFn>, ReturnType<SleepFn>>().mockResolvedValue(undefined);
}

function delaysOf(sleep: ReturnType<typeof createSleep>): number[] {
  return sleep.mock.calls.map(([ms]) => ms);
}

describe('RetryController', () => {
  // ===========================================================================
  // Backoff
  // ===========================================================================

  describe('backoff', () => {
    it('should retry with exponentially growing delays until exhausted', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep });
      const operation = vi.fn().mockRejectedValue(new RequestTimeoutError('openai', 100));

      const failure = controller.run(operation);

      await expect(failure).rejects.toBeInstanceOf(RetriesExhaustedError);
      await expect(failure).rejects.toThrow(
        'Maximum retry attempts exceeded after 3 attempts: Request to openai timed out after 100ms'
      );
      expect(operation).toHaveBeenCalledTimes(3);
      expect(delaysOf(sleep)).toEqual([1000, 2000]);
    });

    it('should return the first successful result', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep });
      const operation = vi.fn()
        .mockRejectedValueOnce(new RequestTimeoutError('openai', 100))
        .mockResolvedValueOnce('ok');

      await expect(controller.run(operation)).resolves.toBe('ok');
      expect(operation.mock.calls).toEqual([[1], [2]]);
    });

    it('should wait at least as long as Retry-After asks', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep });
      const throttled = new ProviderRequestError('openai returned HTTP 429', {
        provider: 'openai',
        body: '',
        status: 429,
        retryAfterMs: 5000,
      });
      const operation = vi.fn().mockRejectedValueOnce(throttled).mockResolvedValueOnce('ok');

      await controller.run(operation);

      expect(delaysOf(sleep)).toEqual([5000]);
    });

    it('should scale delays by the random source when jitter is on', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep, random: () => 0.5, policy: { jitter: true } });
      const operation = vi.fn().mockRejectedValue(new RequestTimeoutError('openai', 100));

      await expect(controller.run(operation)).rejects.toBeInstanceOf(RetriesExhaustedError);

      expect(delaysOf(sleep)).toEqual([500, 1000]);
    });

    it('should compute delays from the policy', () => {
      const controller = new RetryController({ policy: { initialDelayMs: 200, multiplier: 3 } });

      expect([1, 2, 3].map((attempt) => controller.delayFor(attempt))).toEqual([200, 600, 1800]);
    });
  });

  // ===========================================================================
  // Classification
  // ===========================================================================

  describe('classification', () => {
    it('should rethrow non-retryable errors unchanged on the first failure', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep });
      const badRequest = new ProviderRequestError('openai returned HTTP 400', {
        provider: 'openai',
        body: '{"error":"bad"}',
        status: 400,
      });
      const operation = vi.fn().mockRejectedValue(badRequest);

      await expect(controller.run(operation)).rejects.toBe(badRequest);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not retry plain errors', async () => {
      const controller = new RetryController({ sleep: createSleep() });
      const bug = new TypeError('undefined is not a function');

      await expect(controller.run(() => Promise.reject(bug))).rejects.toBe(bug);
    });

    it('should retry only the configured kinds', async () => {
      const sleep = createSleep();
      const controller = new RetryController({ sleep, policy: { retryableKinds: ['server'] } });
      const unavailable = new ProviderRequestError('claude returned HTTP 503', {
        provider: 'claude',
        body: '',
        status: 503,
      });

      expect(controller.isRetryable(unavailable)).toBe(true);
      expect(controller.isRetryable(new RequestTimeoutError('claude', 100))).toBe(false);
      expect(controller.isRetryable(new ConfigurationError('bad'))).toBe(false);
    });

    it('should make a single attempt when maxAttempts is 1', async () => {
      const controller = new RetryController({ sleep: createSleep(), policy: { maxAttempts: 1 } });
      const operation = vi.fn().mockRejectedValue(new RequestTimeoutError('openai', 100));

      const failure = controller.run(operation);

      await expect(failure).rejects.toThrow('Maximum retry attempts exceeded after 1 attempts');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Hooks and cancellation
  // ===========================================================================

  it('should report each retry to onRetry', async () => {
    const controller = new RetryController({ sleep: createSleep() });
    const timeout = new RequestTimeoutError('gemini', 100);
    const onRetry = vi.fn();
    const operation = vi.fn().mockRejectedValueOnce(timeout).mockResolvedValueOnce('ok');

    await controller.run(operation, { onRetry });

    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 1000, error: timeout });
  });

  it('should stop when the signal aborts during backoff', async () => {
    const controller = new RetryController({ policy: { initialDelayMs: 60_000 } });
    const abort = new AbortController();
    abort.abort();
    const operation = vi.fn().mockRejectedValue(new RequestTimeoutError('openai', 100));

    await expect(controller.run(operation, { signal: abort.signal })).rejects.toBeInstanceOf(RequestCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
