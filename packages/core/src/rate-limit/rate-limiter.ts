/**
 * Rate Limiter
 *
 * Fixed-window admission control over three dimensions: requests per
 * minute, tokens per minute and requests per calendar day (UTC), scoped by
 * provider, model and caller. `check` only reads; `record` increments after
 * a successful dispatch through the store's atomic increment.
 */

import {
  CHARS_PER_TOKEN,
  DEFAULT_CALLER_ID,
  RATE_LIMIT_DAILY_TTL_SECONDS,
  RATE_LIMIT_WINDOW_SECONDS,
} from '../constants.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { systemClock, type Clock } from '../types.js';
import type {
  CounterStore,
  DimensionCounts,
  RateLimitConfig,
  RateLimitDecision,
  RateLimitDimension,
  RateLimitRules,
  TokenEstimator,
} from './types.js';

/**
 * Built-in limits.
 */
export const DEFAULT_RATE_LIMIT_RULES: RateLimitRules = {
  default: { requestsPerMinute: 60, requestsPerDay: 1000, tokensPerMinute: 90000 },
  providers: {
    openai: { requestsPerMinute: 500, tokensPerMinute: 90000 },
    gemini: { requestsPerMinute: 60, requestsPerDay: 1500 },
    claude: { requestsPerMinute: 50, tokensPerMinute: 100000 },
    grok: { requestsPerMinute: 60 },
  },
  models: {},
};

/**
 * `len/4` estimate, rounded up.
 */
export const estimateTokensByLength: TokenEstimator = (text) => Math.ceil(text.length / CHARS_PER_TOKEN);

export interface RateLimiterOptions {
  store: CounterStore;
  rules?: RateLimitRules;
  /** When false every check is allowed and nothing is recorded (default: true) */
  enabled?: boolean;
  clock?: Clock;
  estimator?: TokenEstimator;
  logger?: Logger;
}

/**
 * Counter keys for one scope at one instant.
 */
interface WindowKeys {
  requests: string;
  tokens: string;
  daily: string;
  resetAt: number;
}

function isEnforced(limit: number | undefined): limit is number {
  return limit !== undefined && limit > 0;
}

export class RateLimiter {
  private readonly store: CounterStore;
  private readonly rules: RateLimitRules;
  private readonly enabled: boolean;
  private readonly clock: Clock;
  private readonly estimator: TokenEstimator;
  private readonly logger: Logger;

  constructor(options: RateLimiterOptions) {
    this.store = options.store;
    this.rules = options.rules ?? DEFAULT_RATE_LIMIT_RULES;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? systemClock;
    this.estimator = options.estimator ?? estimateTokensByLength;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Limits for a scope: the model entry, else the provider entry, else the default.
   */
  resolveLimits(provider: string, model: string): RateLimitConfig {
    return this.rules.models?.[model] ?? this.rules.providers?.[provider] ?? this.rules.default;
  }

  /**
   * Estimate prompt tokens for the pre-dispatch check.
   */
  estimateTokens(text: string): number {
    return this.estimator(text);
  }

  /**
   * Decide whether a request may proceed. Does not change any counter.
   */
  async check(
    provider: string,
    model: string,
    estimatedTokens = 0,
    callerId: string = DEFAULT_CALLER_ID
  ): Promise<RateLimitDecision> {
    const keys = this.keys(provider, model, callerId);
    const limits = this.enabled ? this.enforcedLimits(provider, model) : {};
    const [requests, tokens, daily] = await Promise.all([
      this.store.get(keys.requests),
      this.store.get(keys.tokens),
      this.store.get(keys.daily),
    ]);

    const decision: RateLimitDecision = {
      allowed: true,
      remaining: {},
      current: { requestsPerMinute: requests, tokensPerMinute: tokens, requestsPerDay: daily },
      limits,
      resetAt: keys.resetAt,
    };

    const deny = (dimension: RateLimitDimension): void => {
      decision.allowed = false;
      decision.deniedBy ??= dimension;
    };

    if (limits.requestsPerMinute !== undefined) {
      decision.remaining.requestsPerMinute = Math.max(0, limits.requestsPerMinute - requests);
      if (requests >= limits.requestsPerMinute) deny('requestsPerMinute');
    }

    if (limits.tokensPerMinute !== undefined) {
      decision.remaining.tokensPerMinute = Math.max(0, limits.tokensPerMinute - tokens);
      if (estimatedTokens > 0 && tokens + estimatedTokens > limits.tokensPerMinute) deny('tokensPerMinute');
    }

    if (limits.requestsPerDay !== undefined) {
      decision.remaining.requestsPerDay = Math.max(0, limits.requestsPerDay - daily);
      if (daily >= limits.requestsPerDay) deny('requestsPerDay');
    }

    if (!decision.allowed) {
      this.logger.warn('Rate limit exceeded', {
        provider,
        model,
        callerId,
        deniedBy: decision.deniedBy,
        current: decision.current,
        limits,
      });
    }

    return decision;
  }

  /**
   * Count a completed request and the tokens it actually used.
   */
  async record(
    provider: string,
    model: string,
    actualTokens = 0,
    callerId: string = DEFAULT_CALLER_ID
  ): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const keys = this.keys(provider, model, callerId);
    const increments: Promise<number>[] = [
      this.store.increment(keys.requests, 1, RATE_LIMIT_WINDOW_SECONDS),
      this.store.increment(keys.daily, 1, RATE_LIMIT_DAILY_TTL_SECONDS),
    ];
    if (actualTokens > 0) {
      increments.push(this.store.increment(keys.tokens, actualTokens, RATE_LIMIT_WINDOW_SECONDS));
    }
    await Promise.all(increments);
  }

  /**
   * Current usage and limits for a scope.
   */
  async getStats(
    provider: string,
    model: string,
    callerId: string = DEFAULT_CALLER_ID
  ): Promise<{ current: Required<DimensionCounts>; limits: RateLimitConfig; resetAt: number }> {
    const decision = await this.check(provider, model, 0, callerId);
    return {
      current: decision.current,
      limits: this.resolveLimits(provider, model),
      resetAt: decision.resetAt,
    };
  }

  /**
   * Clear the current windows for a scope.
   */
  async reset(provider: string, model: string, callerId: string = DEFAULT_CALLER_ID): Promise<void> {
    const keys = this.keys(provider, model, callerId);
    await Promise.all([
      this.store.delete(keys.requests),
      this.store.delete(keys.tokens),
      this.store.delete(keys.daily),
    ]);
  }

  private enforcedLimits(provider: string, model: string): DimensionCounts {
    const config = this.resolveLimits(provider, model);
    const limits: DimensionCounts = {};
    if (isEnforced(config.requestsPerMinute)) limits.requestsPerMinute = config.requestsPerMinute;
    if (isEnforced(config.tokensPerMinute)) limits.tokensPerMinute = config.tokensPerMinute;
    if (isEnforced(config.requestsPerDay)) limits.requestsPerDay = config.requestsPerDay;
    return limits;
  }

  private keys(provider: string, model: string, callerId: string): WindowKeys {
    const now = this.clock.now();
    const windowMs = RATE_LIMIT_WINDOW_SECONDS * 1000;
    const window = Math.floor(now / windowMs);
    const day = new Date(now).toISOString().slice(0, 10);
    const scope = `${provider}:${model}:${callerId}`;

    return {
      requests: `rate_limit:requests:${scope}:${window}`,
      tokens: `rate_limit:tokens:${scope}:${window}`,
      daily: `rate_limit:daily:${scope}:${day}`,
      resetAt: (window + 1) * windowMs,
    };
  }
}
