/**
 * Config Module
 */

export type {
  CacheSettings,
  GatewayConfig,
  PricingSettings,
  ProviderSettings,
  RateLimitSettings,
  ResolvedGatewayConfig,
  ResolvedProviderSettings,
  RetrySettings,
} from './types.js';

export { defineConfig } from './define-config.js';

export {
  EnvProviderConfigs,
  gatewayConfigSchema,
  resolveConfig,
  resolveEnvVar,
  resolveEnvVarOptional,
  validateConfig,
} from './resolver.js';

export {
  findConfigFile,
  hasConfigFile,
  loadConfig,
  loadConfigFile,
  loadConfigWithRaw,
  type LoadConfigResult,
} from './loader.js';
