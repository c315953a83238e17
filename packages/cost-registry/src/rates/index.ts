/**
 * Rate exports for the cost registry.
 */

export {
  createPricingStrategy,
  parsePricingStrategy,
  providerPricingSchema,
  type CreatePricingStrategyOptions,
} from './create-strategy.js';
export { anthropicPricing, ANTHROPIC_PRICING } from './anthropic.js';
export { openaiPricing, OPENAI_PRICING } from './openai.js';
export { geminiPricing, GEMINI_PRICING } from './gemini.js';
export { grokPricing, GROK_PRICING } from './grok.js';
