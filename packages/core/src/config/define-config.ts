/**
 * Define Config Helper
 */

import type { GatewayConfig } from './types.js';

/**
 * Define a gateway configuration with full type safety.
 *
 * @example
 * ```typescript
 * // promptgate.config.ts
 * import { defineConfig } from '@promptgate/core';
 *
 * export default defineConfig({
 *   defaults: { provider: 'claude', model: 'claude-3-5-haiku' },
 *   providers: {
 *     claude: { apiKey: '$ANTHROPIC_API_KEY', timeout: 60000 },
 *   },
 *   rateLimits: {
 *     models: { 'claude-3-5-haiku': { requestsPerMinute: 20 } },
 *   },
 *   pricing: { currency: 'JPY', exchangeRate: 150, decimalPlaces: 2 },
 *   presetsDir: './presets',
 * });
 * ```
 */
export function defineConfig(config: GatewayConfig): GatewayConfig {
  return config;
}
