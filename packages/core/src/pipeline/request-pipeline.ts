/**
 * Request Pipeline
 *
 * resolve -> cache -> rate limit -> dispatch (with retry) -> cost -> store.
 * Every collaborator is passed in; nothing here reads global state.
 */

import type { CostRegistry } from '@promptgate/cost-registry';

import type { CacheManager } from '../cache/cache-manager.js';
import { DEFAULT_CALLER_ID } from '../constants.js';
import {
  RateLimitExceededError,
  errorMessage,
  toGatewayError,
  type GatewayError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { RequestLogger } from '../logging/request-logger.js';
import type { ProviderDispatcher } from '../providers/dispatcher.js';
import { emptyUsage } from '../providers/normalizer.js';
import type { RateLimiter } from '../rate-limit/rate-limiter.js';
import type { ConfigResolver } from '../request/config-resolver.js';
import type { RetryController } from '../retry/retry-controller.js';
import {
  systemClock,
  type CacheEntry,
  type Clock,
  type NormalizedResponse,
  type RequestSpec,
  type ResolvedConfig,
} from '../types.js';

/**
 * Outcome of one call. Failures carry a response too, with `error` set.
 */
export type PipelineResult =
  | { ok: true; response: NormalizedResponse }
  | { ok: false; response: NormalizedResponse; error: GatewayError };

export interface ExecuteOptions {
  /** Identity the rate limiter counts against (default: "anonymous") */
  callerId?: string;
  signal?: AbortSignal;
}

export interface RequestPipelineDeps {
  resolver: ConfigResolver;
  cache: CacheManager;
  rateLimiter: RateLimiter;
  dispatcher: ProviderDispatcher;
  retry: RetryController;
  costs: CostRegistry;
  logger?: Logger;
  requestLogger?: RequestLogger;
  clock?: Clock;
  /** Share one upstream call between concurrent identical requests */
  dedupeInFlight?: boolean;
}

export class RequestPipeline {
  private readonly resolver: ConfigResolver;
  private readonly cache: CacheManager;
  private readonly rateLimiter: RateLimiter;
  private readonly dispatcher: ProviderDispatcher;
  private readonly retry: RetryController;
  private readonly costs: CostRegistry;
  private readonly logger: Logger;
  private readonly requestLogger?: RequestLogger;
  private readonly clock: Clock;
  private readonly dedupeInFlight: boolean;
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();

  constructor(deps: RequestPipelineDeps) {
    this.resolver = deps.resolver;
    this.cache = deps.cache;
    this.rateLimiter = deps.rateLimiter;
    this.dispatcher = deps.dispatcher;
    this.retry = deps.retry;
    this.costs = deps.costs;
    this.logger = deps.logger ?? silentLogger;
    this.requestLogger = deps.requestLogger;
    this.clock = deps.clock ?? systemClock;
    this.dedupeInFlight = deps.dedupeInFlight ?? false;
  }

  /**
   * Run one request. Never rejects for request failures.
   */
  async execute(spec: RequestSpec, options: ExecuteOptions = {}): Promise<PipelineResult> {
    const started = this.clock.now();
    let config: ResolvedConfig | undefined;
    let result: PipelineResult;

    try {
      config = this.resolver.resolve(spec);
      result = { ok: true, response: await this.respond(config, options, started) };
    } catch (error) {
      const failure = toGatewayError(error);
      result = { ok: false, response: this.failureResponse(failure, started), error: failure };
    }

    await this.logRequest(spec, result, config, started);
    return result;
  }

  /**
   * Run one request and return its response.
   *
   * @throws {GatewayError} the typed failure
   */
  async request(spec: RequestSpec, options: ExecuteOptions = {}): Promise<NormalizedResponse> {
    const result = await this.execute(spec, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.response;
  }

  private async respond(
    config: ResolvedConfig,
    options: ExecuteOptions,
    started: number
  ): Promise<NormalizedResponse> {
    const { provider, model, prompt, systemPrompt } = config;

    const hit = await this.cache.get(provider, model, prompt, config.options, systemPrompt);
    if (hit) {
      this.cache.recordHit();
      return { ...hit, cached: true, responseTimeMs: 0 };
    }
    if (this.cache.isEnabled) {
      this.cache.recordMiss();
    }

    const entry = await this.fetchShared(config, options);
    return {
      ...entry,
      cached: false,
      responseTimeMs: this.clock.now() - started,
    };
  }

  private async fetchShared(config: ResolvedConfig, options: ExecuteOptions): Promise<CacheEntry> {
    if (!this.dedupeInFlight) {
      return this.fetchAndStore(config, options);
    }

    const key = this.cache.key(config.provider, config.model, config.prompt, config.options, config.systemPrompt);
    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug('Joining in-flight request', { provider: config.provider, model: config.model });
      return structuredClone(await pending);
    }

    const call = this.fetchAndStore(config, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, call);
    return call;
  }

  private async fetchAndStore(config: ResolvedConfig, options: ExecuteOptions): Promise<CacheEntry> {
    const { provider, model, prompt, systemPrompt } = config;
    const callerId = options.callerId ?? DEFAULT_CALLER_ID;

    const estimated = this.rateLimiter.estimateTokens(systemPrompt ? `${systemPrompt}\n${prompt}` : prompt);
    const decision = await this.rateLimiter.check(provider, model, estimated, callerId);
    if (!decision.allowed) {
      throw new RateLimitExceededError(decision);
    }

    const reply = await this.retry.run(
      () => this.dispatcher.dispatch(config, { signal: options.signal }),
      {
        signal: options.signal,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(`Retrying ${provider}/${model} after attempt ${attempt}: ${error.message}`, { delayMs });
        },
      }
    );

    const { usage } = reply;
    const cost = this.costs.calculate({
      provider,
      model,
      usage: {
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        cachedInputTokens: usage.cachedTokens,
        reasoningTokens: usage.reasoningTokens,
      },
    });
    if (!cost.priced) {
      this.logger.debug(`No pricing for ${provider}/${model}, cost is 0`);
    }

    const entry: CacheEntry = {
      content: reply.content,
      usage,
      cost: cost.totalCost,
      meta: {
        ...reply.meta,
        provider,
        model,
        currency: cost.currency,
        priced: cost.priced,
      },
    };

    await this.cache.put(provider, model, prompt, config.options, entry, undefined, systemPrompt);
    await this.rateLimiter.record(provider, model, usage.totalTokens, callerId);
    return entry;
  }

  private failureResponse(error: GatewayError, started: number): NormalizedResponse {
    return {
      content: '',
      usage: emptyUsage(),
      cost: 0,
      meta: { kind: error.kind },
      cached: false,
      responseTimeMs: this.clock.now() - started,
      error: error.message,
    };
  }

  private async logRequest(
    spec: RequestSpec,
    result: PipelineResult,
    config: ResolvedConfig | undefined,
    started: number
  ): Promise<void> {
    if (!this.requestLogger) {
      return;
    }

    try {
      await this.requestLogger.log({
        spec,
        response: result.response,
        provider: config?.provider ?? spec.provider ?? '',
        model: config?.model ?? spec.model ?? '',
        durationMs: this.clock.now() - started,
        error: result.ok ? undefined : result.error,
        timestamp: this.clock.now(),
      });
    } catch (error) {
      this.logger.error(`Request logger failed: ${errorMessage(error)}`);
    }
  }
}
