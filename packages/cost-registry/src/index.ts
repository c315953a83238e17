/**
 * @promptgate/cost-registry
 *
 * Model pricing catalogs, cost calculation and token counting.
 *
 * @example
 * ```typescript
 * import { CostRegistry } from '@promptgate/cost-registry';
 *
 * const registry = CostRegistry.default();
 *
 * const cost = registry.calculate({
 *   provider: 'claude',
 *   model: 'claude-3-5-haiku-20241022',
 *   usage: { inputTokens: 1000, outputTokens: 100 },
 * });
 *
 * console.log(`Total cost: $${cost.totalCost.toFixed(4)}`);
 * ```
 */

// Registry
export { CostRegistry, DEFAULT_CURRENCY_SETTINGS, roundTo } from './registry.js';

// Types
export type {
  TokenUsage,
  TextModelPricing,
  ImageModelPricing,
  ImagePriceTable,
  ModelPricing,
  ProviderPricing,
  CostResult,
  CostCalculationInput,
  ImageCostOptions,
  CurrencySettings,
  PricingStrategy,
} from './types.js';

// Rates
export {
  createPricingStrategy,
  parsePricingStrategy,
  providerPricingSchema,
  anthropicPricing,
  openaiPricing,
  geminiPricing,
  grokPricing,
  ANTHROPIC_PRICING,
  OPENAI_PRICING,
  GEMINI_PRICING,
  GROK_PRICING,
} from './rates/index.js';
export type { CreatePricingStrategyOptions } from './rates/index.js';

// Token counting
export { createTokenCounter, encodingForModel } from './counting/index.js';
export type { TiktokenEncoding, TokenCounterOptions, TokenCounter } from './counting/index.js';
