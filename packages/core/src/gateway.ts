/**
 * Gateway
 *
 * Wires every pipeline collaborator from one config and offers a fluent
 * request builder on top.
 *
 * @example
 * ```typescript
 * const gateway = createGateway({ defaults: { provider: 'claude', model: 'claude-3-5-haiku' } });
 *
 * const response = await gateway
 *   .request()
 *   .preset('ask')
 *   .prompt('Summarize {{topic}} in two sentences')
 *   .vars({ topic: 'rate limiting' })
 *   .run();
 * ```
 */

import { CostRegistry, createTokenCounter } from '@promptgate/cost-registry';

import { CacheManager } from './cache/cache-manager.js';
import { MemoryCacheStore } from './cache/memory-cache-store.js';
import type { CacheStore } from './cache/types.js';
import { resolveConfig, validateConfig, EnvProviderConfigs } from './config/resolver.js';
import type { GatewayConfig, ResolvedGatewayConfig } from './config/types.js';
import { silentLogger, type Logger } from './logging/logger.js';
import type { RequestLogger } from './logging/request-logger.js';
import { executeBatch, type BatchOptions, type BatchResult } from './pipeline/batch.js';
import {
  RequestPipeline,
  type ExecuteOptions,
  type PipelineResult,
} from './pipeline/request-pipeline.js';
import { InMemoryPresetRepository, YamlPresetRepository, type PresetRepository } from './presets/preset-repository.js';
import { PromptManager } from './prompts/prompt-manager.js';
import { ProviderDispatcher, type ProviderConfigSource } from './providers/dispatcher.js';
import { ProviderRegistry } from './providers/factory.js';
import { FileCounterStore } from './rate-limit/file-counter-store.js';
import { MemoryCounterStore } from './rate-limit/memory-counter-store.js';
import { estimateTokensByLength, RateLimiter } from './rate-limit/rate-limiter.js';
import type { CounterStore, TokenEstimator } from './rate-limit/types.js';
import { ConfigResolver } from './request/config-resolver.js';
import { RetryController } from './retry/retry-controller.js';
import {
  systemClock,
  type Clock,
  type NormalizedResponse,
  type RequestOptions,
  type RequestSpec,
  type TemplateVars,
} from './types.js';
import type { SleepFn } from './utils/sleep.js';

/**
 * Collaborators that replace the ones built from config.
 */
export interface GatewayOverrides {
  fetch?: typeof fetch;
  clock?: Clock;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
  requestLogger?: RequestLogger;
  cacheStore?: CacheStore;
  counterStore?: CounterStore;
  presets?: PresetRepository;
  prompts?: PromptManager;
  providers?: ProviderRegistry;
  providerConfigs?: ProviderConfigSource;
  tokenEstimator?: TokenEstimator;
  costs?: CostRegistry;
  /** Environment used for `$ENV_VAR` API keys */
  env?: NodeJS.ProcessEnv;
}

export interface Gateway {
  readonly config: ResolvedGatewayConfig;
  readonly pipeline: RequestPipeline;
  readonly cache: CacheManager;
  readonly rateLimiter: RateLimiter;
  readonly costs: CostRegistry;
  readonly presets: PresetRepository;
  readonly prompts: PromptManager;
  readonly providers: ProviderRegistry;

  /** Start a fluent request */
  request(): RequestBuilder;
  execute(spec: RequestSpec, options?: ExecuteOptions): Promise<PipelineResult>;
  batch(specs: readonly RequestSpec[], options?: BatchOptions): Promise<BatchResult>;
}

/**
 * Fluent builder for one request.
 */
export class RequestBuilder {
  private readonly spec: RequestSpec = { prompt: '' };
  private readonly executeOptions: ExecuteOptions = {};

  constructor(
    private readonly pipeline: Pick<RequestPipeline, 'execute' | 'request'>,
    private readonly prompts: PromptManager
  ) {}

  provider(name: string): this {
    this.spec.provider = name;
    return this;
  }

  model(name: string): this {
    this.spec.model = name;
    return this;
  }

  preset(name: string): this {
    this.spec.presetName = name;
    return this;
  }

  prompt(text: string): this {
    this.spec.prompt = text;
    return this;
  }

  /**
   * Use a stored prompt template; its placeholders are filled from `vars`.
   *
   * @throws {PromptNotFoundError}
   */
  promptTemplate(name: string, vars: TemplateVars = {}): this {
    this.spec.prompt = this.prompts.get(name);
    return this.vars(vars);
  }

  systemPrompt(text: string): this {
    this.spec.systemPrompt = text;
    return this;
  }

  /** Merged over earlier options */
  options(options: RequestOptions): this {
    this.spec.options = { ...this.spec.options, ...options };
    return this;
  }

  vars(vars: TemplateVars): this {
    this.spec.vars = { ...this.spec.vars, ...vars };
    return this;
  }

  temperature(value: number): this {
    return this.options({ temperature: value });
  }

  maxTokens(value: number): this {
    return this.options({ max_tokens: value });
  }

  stream(enabled = true): this {
    this.spec.stream = enabled;
    return this;
  }

  caller(callerId: string): this {
    this.executeOptions.callerId = callerId;
    return this;
  }

  signal(signal: AbortSignal): this {
    this.executeOptions.signal = signal;
    return this;
  }

  build(): RequestSpec {
    return structuredClone(this.spec);
  }

  /**
   * Run and return the result, successful or not.
   */
  execute(): Promise<PipelineResult> {
    return this.pipeline.execute(this.build(), this.executeOptions);
  }

  /**
   * Run and return the response.
   *
   * @throws {GatewayError} when the request fails
   */
  run(): Promise<NormalizedResponse> {
    return this.pipeline.request(this.build(), this.executeOptions);
  }
}

function buildCosts(config: ResolvedGatewayConfig): CostRegistry {
  const costs = CostRegistry.default({
    currency: config.pricing.currency,
    exchangeRate: config.pricing.exchangeRate,
    decimalPlaces: config.pricing.decimalPlaces,
  });
  for (const [provider, catalog] of Object.entries(config.pricing.catalogs)) {
    costs.registerCatalog(provider, catalog);
  }
  return costs;
}

function buildCounterStore(config: ResolvedGatewayConfig, clock: Clock): CounterStore {
  if (config.rateLimits.store === 'file') {
    return new FileCounterStore({ path: config.rateLimits.file, clock });
  }
  return new MemoryCounterStore(clock);
}

function buildEstimator(config: ResolvedGatewayConfig): TokenEstimator {
  if (config.rateLimits.estimator === 'tiktoken') {
    return createTokenCounter();
  }
  return estimateTokensByLength;
}

/**
 * Build a gateway from a resolved config.
 */
export function buildGateway(config: ResolvedGatewayConfig, overrides: GatewayOverrides = {}): Gateway {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? silentLogger;

  const presets = overrides.presets
    ?? (config.presetsDir ? new YamlPresetRepository(config.presetsDir) : new InMemoryPresetRepository());
  const prompts = overrides.prompts
    ?? (config.promptsDir ? PromptManager.fromDirectory(config.promptsDir) : new PromptManager());
  const providers = overrides.providers ?? new ProviderRegistry();
  const costs = overrides.costs ?? buildCosts(config);

  const cache = new CacheManager({
    store: overrides.cacheStore ?? new MemoryCacheStore(clock),
    enabled: config.cache.enabled,
    ttl: config.cache.ttl,
    prefix: config.cache.prefix,
    tags: config.cache.tags,
    logger: logger.child('Cache'),
  });

  const rateLimiter = new RateLimiter({
    store: overrides.counterStore ?? buildCounterStore(config, clock),
    rules: config.rateLimits.rules,
    enabled: config.rateLimits.enabled,
    clock,
    estimator: overrides.tokenEstimator ?? buildEstimator(config),
    logger: logger.child('RateLimit'),
  });

  const dispatcher = new ProviderDispatcher({
    configs: overrides.providerConfigs ?? new EnvProviderConfigs(config.providers, overrides.env),
    providers,
    fetch: overrides.fetch,
    clock,
    logger: logger.child('Provider'),
  });

  const retry = new RetryController({
    policy: config.retry,
    sleep: overrides.sleep,
    random: overrides.random,
    logger: logger.child('Retry'),
  });

  const pipeline = new RequestPipeline({
    resolver: new ConfigResolver({ presets, defaults: config.defaults }),
    cache,
    rateLimiter,
    dispatcher,
    retry,
    costs,
    logger,
    requestLogger: overrides.requestLogger,
    clock,
    dedupeInFlight: config.dedupeInFlight,
  });

  return {
    config,
    pipeline,
    cache,
    rateLimiter,
    costs,
    presets,
    prompts,
    providers,
    request: () => new RequestBuilder(pipeline, prompts),
    execute: (spec, options) => pipeline.execute(spec, options),
    batch: (specs, options = {}) =>
      executeBatch(pipeline, specs, {
        ...options,
        concurrency: options.concurrency ?? config.batch.concurrency,
        clock: options.clock ?? clock,
        logger: options.logger ?? logger.child('Batch'),
      }),
  };
}

/**
 * Validate a config, apply defaults and build a gateway.
 *
 * @throws {ConfigurationError} when the config is invalid
 */
export function createGateway(config: GatewayConfig = {}, overrides: GatewayOverrides = {}): Gateway {
  return buildGateway(resolveConfig(validateConfig(config)), overrides);
}
