/**
 * @promptgate/core
 *
 * One request pipeline in front of several LLM providers: presets and
 * defaults, a tagged response cache, fixed-window rate limits, retries with
 * backoff, normalized responses and per-call cost.
 *
 * @example
 * ```typescript
 * // promptgate.config.ts
 * import { defineConfig } from '@promptgate/core';
 *
 * export default defineConfig({
 *   defaults: { provider: 'openai', model: 'gpt-4.1-mini' },
 *   cache: { ttl: 600 },
 *   rateLimits: { providers: { openai: { requestsPerMinute: 100 } } },
 * });
 * ```
 *
 * Then run:
 * ```bash
 * npx promptgate ask "Explain fixed-window rate limiting"
 * npx promptgate batch requests.yaml --concurrency 8
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Gateway
// =============================================================================

export {
  buildGateway,
  createGateway,
  RequestBuilder,
  type Gateway,
  type GatewayOverrides,
} from './gateway.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  defineConfig,
  EnvProviderConfigs,
  findConfigFile,
  gatewayConfigSchema,
  hasConfigFile,
  loadConfig,
  loadConfigFile,
  loadConfigWithRaw,
  resolveConfig,
  resolveEnvVar,
  resolveEnvVarOptional,
  validateConfig,
} from './config/index.js';

export type {
  CacheSettings,
  GatewayConfig,
  LoadConfigResult,
  PricingSettings,
  ProviderSettings,
  RateLimitSettings,
  ResolvedGatewayConfig,
  ResolvedProviderSettings,
  RetrySettings,
} from './config/index.js';

export * from './constants.js';

// =============================================================================
// Types and errors
// =============================================================================

export { systemClock } from './types.js';
export type {
  CacheEntry,
  Clock,
  NormalizedResponse,
  Preset,
  ProviderConfig,
  RequestOptions,
  RequestSpec,
  ResolvedConfig,
  TemplateVars,
  Usage,
} from './types.js';

export {
  classifyError,
  ConfigurationError,
  ConnectionError,
  errorMessage,
  GatewayError,
  kindForStatus,
  PresetNotFoundError,
  PresetParseError,
  PromptNotFoundError,
  PromptParseError,
  ProviderConfigMissingError,
  ProviderRequestError,
  RateLimitExceededError,
  RequestCancelledError,
  RequestTimeoutError,
  RetriesExhaustedError,
  toGatewayError,
  UnknownProviderError,
} from './errors.js';
export type { ErrorKind, ProviderRequestErrorDetails } from './errors.js';

// =============================================================================
// Pipeline
// =============================================================================

export * from './pipeline/index.js';
export * from './request/index.js';
export * from './presets/index.js';
export * from './prompts/index.js';
export * from './cache/index.js';
export * from './rate-limit/index.js';
export * from './providers/index.js';
export * from './retry/index.js';
export * from './logging/index.js';

// =============================================================================
// Utilities
// =============================================================================

export { sleep, type SleepFn } from './utils/sleep.js';
export { renderTemplate } from './utils/template.js';
export { stableStringify } from './utils/stable-json.js';

// =============================================================================
// CLI
// =============================================================================

export { createCli, runCli } from './cli/index.js';
