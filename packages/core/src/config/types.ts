/**
 * Configuration Types
 *
 * Shape of `promptgate.config.ts` and of the config after defaults and
 * environment references are applied.
 */

import type { CurrencySettings } from '@promptgate/cost-registry';

import type { ErrorKind } from '../errors.js';
import type { RateLimitConfig, RateLimitRules } from '../rate-limit/types.js';
import type { RequestDefaults } from '../request/config-resolver.js';
import type { RetryPolicy } from '../retry/retry-controller.js';
import type { RequestOptions } from '../types.js';

// =============================================================================
// User-facing config
// =============================================================================

/**
 * Connection settings for one provider. String values may be `$ENV_VAR` references.
 */
export interface ProviderSettings {
  /** API key or `$ENV_VAR` reference, resolved when the provider is first called */
  apiKey?: string;
  /** Overrides the provider's public endpoint */
  baseUrl?: string;
  headers?: Record<string, string>;
  /** Request timeout in milliseconds */
  timeout?: number;
}

export interface CacheSettings {
  enabled?: boolean;
  /** Entry lifetime in seconds */
  ttl?: number;
  prefix?: string;
  /** Tags added to every entry */
  tags?: string[];
}

export interface RateLimitSettings {
  enabled?: boolean;
  default?: RateLimitConfig;
  providers?: Record<string, RateLimitConfig>;
  models?: Record<string, RateLimitConfig>;
  /**
   * Counter storage. `file` shares counters between processes on one host.
   * @default 'memory'
   */
  store?: 'memory' | 'file';
  /** Counter file for the `file` store */
  file?: string;
  /**
   * Prompt token estimate for the tokens-per-minute check.
   * @default 'length'
   */
  estimator?: 'length' | 'tiktoken';
}

export interface RetrySettings {
  maxAttempts?: number;
  initialDelayMs?: number;
  multiplier?: number;
  jitter?: boolean;
  /** Error kinds that are retried */
  retryOn?: ErrorKind[];
}

export interface PricingSettings {
  currency?: string;
  exchangeRate?: number;
  decimalPlaces?: number;
  /** Extra or replacement catalogs, keyed by provider */
  catalogs?: Record<string, unknown>;
}

/**
 * Gateway configuration as written in `promptgate.config.ts`.
 */
export interface GatewayConfig {
  defaults?: {
    provider?: string;
    model?: string;
    options?: RequestOptions;
  };
  providers?: Record<string, ProviderSettings>;
  cache?: CacheSettings;
  rateLimits?: RateLimitSettings;
  retry?: RetrySettings;
  pricing?: PricingSettings;
  /** Directory of `<name>.yaml` preset files */
  presetsDir?: string;
  /** Directory of `.md` prompt templates */
  promptsDir?: string;
  batch?: {
    concurrency?: number;
  };
  /** Share one upstream call between concurrent identical requests */
  dedupeInFlight?: boolean;
  verbose?: boolean;
}

// =============================================================================
// Resolved config
// =============================================================================

export interface ResolvedProviderSettings {
  /** Still a `$ENV_VAR` reference when configured as one */
  apiKey: string;
  baseUrl?: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface ResolvedGatewayConfig {
  defaults: RequestDefaults;
  providers: Record<string, ResolvedProviderSettings>;
  cache: Required<CacheSettings>;
  rateLimits: {
    enabled: boolean;
    rules: RateLimitRules;
    store: 'memory' | 'file';
    file: string;
    estimator: 'length' | 'tiktoken';
  };
  retry: RetryPolicy;
  pricing: CurrencySettings & { catalogs: Record<string, unknown> };
  presetsDir?: string;
  promptsDir?: string;
  batch: { concurrency: number };
  dedupeInFlight: boolean;
  verbose: boolean;
}
