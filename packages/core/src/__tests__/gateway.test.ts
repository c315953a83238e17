/**
 * Gateway Tests
 *
 * Builds a gateway from config with stubbed fetch and environment.
 */

import { describe, it, expect, vi } from 'vitest';

import { ConfigurationError } from '../errors.js';
import { createGateway, type GatewayOverrides } from '../gateway.js';
import { PromptManager } from '../prompts/prompt-manager.js';
import type { SleepFn } from '../utils/sleep.js';
import { chatCompletion, createFetchMock, FakeClock, jsonResponse, requestBody } from './support/fakes.js';

function overrides(extra: GatewayOverrides = {}): GatewayOverrides {
  return {
    clock: new FakeClock(),
    sleep: vi.fn<Parameters<SleepFn>, ReturnType<SleepFn>>().mockResolvedValue(undefined),
    env: { OPENAI_API_KEY: 'test-key' },
    ...extra,
  };
}

describe('createGateway', () => {
  // ===========================================================================
  // Request builder
  // ===========================================================================

  describe('request builder', () => {
    it('should send a fluent request through the configured provider', async () => {
      const fetchMock = createFetchMock().mockImplementation(async () => jsonResponse(chatCompletion('Hi there')));
      const gateway = createGateway({}, overrides({ fetch: fetchMock }));

      const response = await gateway.request().prompt('Hello').temperature(0.1).maxTokens(64).run();

      expect(response.content).toBe('Hi there');
      const [, init] = fetchMock.mock.calls[0] ?? [];
      expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
      expect(requestBody(init)).toMatchObject({ model: 'gpt-4.1-mini', temperature: 0.1, max_tokens: 64 });
    });

    it('should merge options and vars across calls', () => {
      const gateway = createGateway({}, overrides());

      const spec = gateway
        .request()
        .provider('claude')
        .model('claude-3-5-haiku')
        .preset('ask')
        .systemPrompt('Be brief')
        .prompt('Explain {{topic}} to a {{level}}')
        .options({ temperature: 0.5, top_p: 0.9 })
        .temperature(0.2)
        .vars({ topic: 'queues' })
        .vars({ level: 'beginner' })
        .stream()
        .build();

      expect(spec).toEqual({
        provider: 'claude',
        model: 'claude-3-5-haiku',
        presetName: 'ask',
        systemPrompt: 'Be brief',
        prompt: 'Explain {{topic}} to a {{level}}',
        options: { temperature: 0.2, top_p: 0.9 },
        vars: { topic: 'queues', level: 'beginner' },
        stream: true,
      });
    });

    it('should fill a stored prompt template from vars', async () => {
      const prompts = new PromptManager();
      prompts.add('greet', 'Say hello to {{name}}');
      const gateway = createGateway({}, overrides({ prompts }));

      const response = await gateway.request().provider('mock').promptTemplate('greet', { name: 'Ada' }).run();

      expect(response.content).toBe('Mock response to: Say hello to Ada (System: You are a helpful assistant.)');
    });

    it('should count requests against the caller', async () => {
      const gateway = createGateway({}, overrides());

      await gateway.request().provider('mock').prompt('ping').caller('team-a').execute();

      const stats = await gateway.rateLimiter.getStats('mock', 'gpt-4.1-mini', 'team-a');
      expect(stats.current.requestsPerMinute).toBe(1);
    });
  });

  // ===========================================================================
  // Configuration
  // ===========================================================================

  describe('configuration', () => {
    it('should report a missing API key as a configuration failure without retrying', async () => {
      const fetchMock = createFetchMock();
      const gateway = createGateway({}, overrides({ fetch: fetchMock, env: {} }));

      const result = await gateway.execute({ prompt: 'Hello' });

      expect(result.ok).toBe(false);
      expect(result.response.error).toBe("Provider 'openai' is not configured: set OPENAI_API_KEY");
      expect(result.response.meta).toEqual({ kind: 'configuration' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should price with configured catalogs and currency', async () => {
      const gateway = createGateway({
        pricing: {
          currency: 'JPY',
          exchangeRate: 150,
          decimalPlaces: 2,
          catalogs: { mock: { 'mock-model': { inputPer1M: 1_000_000, outputPer1M: 2_000_000 } } },
        },
      }, overrides());

      const response = await gateway.request().provider('mock').model('mock-model').prompt('Hello world!').run();

      expect(response.usage.inputTokens).toBe(3);
      expect(response.usage.outputTokens).toBe(20);
      expect(response.cost).toBe(6450);
      expect(response.meta).toMatchObject({ currency: 'JPY', priced: true });
    });

    it('should skip the cache when it is disabled', async () => {
      const gateway = createGateway({ cache: { enabled: false } }, overrides());

      await gateway.request().provider('mock').prompt('ping').run();
      const second = await gateway.request().provider('mock').prompt('ping').run();

      expect(second.cached).toBe(false);
    });

    it('should reject invalid config', () => {
      expect(() => createGateway({ batch: { concurrency: 0 } })).toThrow(ConfigurationError);
    });
  });

  // ===========================================================================
  // Batch
  // ===========================================================================

  it('should run batches with the configured concurrency', async () => {
    const gateway = createGateway({ batch: { concurrency: 2 } }, overrides());

    const batch = await gateway.batch([
      { prompt: 'one', provider: 'mock' },
      { prompt: ' ', provider: 'mock' },
      { prompt: 'three', provider: 'mock' },
    ], { concurrency: undefined });

    expect(batch.succeeded).toBe(2);
    expect(batch.failed).toBe(1);
    expect(batch.results[0]?.response.content).toBe('Mock response to: one (System: You are a helpful assistant.)');
    expect(batch.results[1]?.response.error).toBe('A prompt is required');
  });
});
