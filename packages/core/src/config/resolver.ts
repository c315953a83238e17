/**
 * Config Resolver
 *
 * Validates raw config with zod and fills in defaults. API keys stay as
 * `$ENV_VAR` references until a provider is dispatched, so an unused
 * provider without a key is not an error.
 */

import { z } from 'zod';

import {
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_CACHE_PREFIX,
  DEFAULT_CACHE_TAGS,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_CURRENCY,
  DEFAULT_DECIMAL_PLACES,
  DEFAULT_EXCHANGE_RATE,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_PROVIDER_API_KEYS,
  DEFAULT_RATE_LIMIT_FILE,
} from '../constants.js';
import { ConfigurationError, ProviderConfigMissingError, type ErrorKind } from '../errors.js';
import type { ProviderConfigSource } from '../providers/dispatcher.js';
import { DEFAULT_RATE_LIMIT_RULES } from '../rate-limit/rate-limiter.js';
import { DEFAULT_REQUEST_DEFAULTS } from '../request/config-resolver.js';
import { DEFAULT_RETRY_POLICY } from '../retry/retry-controller.js';
import type { ProviderConfig } from '../types.js';
import type {
  GatewayConfig,
  ProviderSettings,
  ResolvedGatewayConfig,
  ResolvedProviderSettings,
} from './types.js';

/**
 * Resolve a string value that may be a $ENV_VAR reference.
 *
 * @example
 * resolveEnvVar('$OPENAI_API_KEY')  // Returns process.env.OPENAI_API_KEY
 * resolveEnvVar('https://proxy.local/v1')  // Returns as-is
 *
 * @throws {ConfigurationError} when the referenced variable is not set
 */
export function resolveEnvVar(value: string, env: NodeJS.ProcessEnv = process.env): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const envName = value.slice(1);
  const envValue = env[envName];

  if (envValue === undefined || envValue === '') {
    throw new ConfigurationError(`Environment variable ${envName} is not set (referenced as ${value})`);
  }

  return envValue;
}

/**
 * Resolve a string value, returning undefined if the env var is not set.
 */
export function resolveEnvVarOptional(
  value: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (value === undefined || !value.startsWith('$')) {
    return value;
  }
  return env[value.slice(1)] || undefined;
}

// =============================================================================
// Validation
// =============================================================================

const ERROR_KINDS = [
  'configuration',
  'rate_limit',
  'timeout',
  'connection',
  'server',
  'client',
  'malformed',
  'exhausted',
  'cancelled',
  'unknown',
] as const satisfies readonly ErrorKind[];

const limitSchema = z.number().int().nonnegative().optional();

const rateLimitConfigSchema = z.object({
  requestsPerMinute: limitSchema,
  tokensPerMinute: limitSchema,
  requestsPerDay: limitSchema,
}).strict();

const providerSettingsSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  timeout: z.number().int().positive().optional(),
}).strict();

/**
 * Schema for `promptgate.config.*` files.
 */
export const gatewayConfigSchema = z.object({
  defaults: z.object({
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    options: z.record(z.unknown()).optional(),
  }).strict().optional(),
  providers: z.record(providerSettingsSchema).optional(),
  cache: z.object({
    enabled: z.boolean().optional(),
    ttl: z.number().int().positive().optional(),
    prefix: z.string().min(1).optional(),
    tags: z.array(z.string()).optional(),
  }).strict().optional(),
  rateLimits: z.object({
    enabled: z.boolean().optional(),
    default: rateLimitConfigSchema.optional(),
    providers: z.record(rateLimitConfigSchema).optional(),
    models: z.record(rateLimitConfigSchema).optional(),
    store: z.enum(['memory', 'file']).optional(),
    file: z.string().min(1).optional(),
    estimator: z.enum(['length', 'tiktoken']).optional(),
  }).strict().optional(),
  retry: z.object({
    maxAttempts: z.number().int().min(1).optional(),
    initialDelayMs: z.number().nonnegative().optional(),
    multiplier: z.number().min(1).optional(),
    jitter: z.boolean().optional(),
    retryOn: z.array(z.enum(ERROR_KINDS)).optional(),
  }).strict().optional(),
  pricing: z.object({
    currency: z.string().min(1).optional(),
    exchangeRate: z.number().positive().optional(),
    decimalPlaces: z.number().int().min(0).max(12).optional(),
    catalogs: z.record(z.unknown()).optional(),
  }).strict().optional(),
  presetsDir: z.string().optional(),
  promptsDir: z.string().optional(),
  batch: z.object({
    concurrency: z.number().int().min(1).optional(),
  }).strict().optional(),
  dedupeInFlight: z.boolean().optional(),
  verbose: z.boolean().optional(),
}).strict();

/**
 * Validate raw configuration.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function validateConfig(config: unknown): GatewayConfig {
  const parsed = gatewayConfigSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `"${issue.path.join('.') || '(root)'}" ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Config error: ${problems}`);
  }
  return parsed.data;
}

// =============================================================================
// Resolution
// =============================================================================

function resolveProviders(
  providers: Record<string, ProviderSettings> = {}
): Record<string, ResolvedProviderSettings> {
  const names = new Set([...Object.keys(DEFAULT_PROVIDER_API_KEYS), ...Object.keys(providers)]);
  const resolved: Record<string, ResolvedProviderSettings> = {};

  for (const name of names) {
    const settings = providers[name] ?? {};
    resolved[name] = {
      apiKey: settings.apiKey ?? DEFAULT_PROVIDER_API_KEYS[name] ?? '',
      baseUrl: settings.baseUrl,
      headers: settings.headers ?? {},
      timeoutMs: settings.timeout ?? DEFAULT_HTTP_TIMEOUT_MS,
    };
  }
  return resolved;
}

/**
 * Apply defaults to a validated config.
 */
export function resolveConfig(config: GatewayConfig): ResolvedGatewayConfig {
  const rateLimits = config.rateLimits ?? {};
  const retry = config.retry ?? {};
  const pricing = config.pricing ?? {};

  return {
    defaults: {
      provider: config.defaults?.provider ?? DEFAULT_REQUEST_DEFAULTS.provider,
      model: config.defaults?.model ?? DEFAULT_REQUEST_DEFAULTS.model,
      options: { ...DEFAULT_REQUEST_DEFAULTS.options, ...config.defaults?.options },
    },
    providers: resolveProviders(config.providers),
    cache: {
      enabled: config.cache?.enabled ?? true,
      ttl: config.cache?.ttl ?? DEFAULT_CACHE_TTL_SECONDS,
      prefix: config.cache?.prefix ?? DEFAULT_CACHE_PREFIX,
      tags: config.cache?.tags ?? [...DEFAULT_CACHE_TAGS],
    },
    rateLimits: {
      enabled: rateLimits.enabled ?? true,
      rules: {
        default: rateLimits.default ?? DEFAULT_RATE_LIMIT_RULES.default,
        providers: { ...DEFAULT_RATE_LIMIT_RULES.providers, ...rateLimits.providers },
        models: { ...DEFAULT_RATE_LIMIT_RULES.models, ...rateLimits.models },
      },
      store: rateLimits.store ?? 'memory',
      file: rateLimits.file ?? DEFAULT_RATE_LIMIT_FILE,
      estimator: rateLimits.estimator ?? 'length',
    },
    retry: {
      maxAttempts: retry.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      initialDelayMs: retry.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
      multiplier: retry.multiplier ?? DEFAULT_RETRY_POLICY.multiplier,
      jitter: retry.jitter ?? DEFAULT_RETRY_POLICY.jitter,
      retryableKinds: retry.retryOn ?? DEFAULT_RETRY_POLICY.retryableKinds,
    },
    pricing: {
      currency: pricing.currency ?? DEFAULT_CURRENCY,
      exchangeRate: pricing.exchangeRate ?? DEFAULT_EXCHANGE_RATE,
      decimalPlaces: pricing.decimalPlaces ?? DEFAULT_DECIMAL_PLACES,
      catalogs: pricing.catalogs ?? {},
    },
    presetsDir: config.presetsDir,
    promptsDir: config.promptsDir,
    batch: { concurrency: config.batch?.concurrency ?? DEFAULT_BATCH_CONCURRENCY },
    dedupeInFlight: config.dedupeInFlight ?? false,
    verbose: config.verbose ?? false,
  };
}

/**
 * Provider settings whose API keys are read from the environment on use.
 */
export class EnvProviderConfigs implements ProviderConfigSource {
  constructor(
    private readonly providers: Readonly<Record<string, ResolvedProviderSettings>>,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  get(provider: string): ProviderConfig {
    const settings = this.providers[provider];
    if (!settings) {
      throw new ProviderConfigMissingError(provider);
    }

    const apiKey = resolveEnvVarOptional(settings.apiKey, this.env);
    if (!apiKey) {
      const hint = settings.apiKey.startsWith('$') ? `set ${settings.apiKey.slice(1)}` : 'no API key';
      throw new ProviderConfigMissingError(provider, hint);
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(settings.headers)) {
      headers[name] = resolveEnvVar(value, this.env);
    }

    return {
      apiKey,
      baseUrl: resolveEnvVarOptional(settings.baseUrl, this.env),
      headers,
      timeoutMs: settings.timeoutMs,
    };
  }
}
