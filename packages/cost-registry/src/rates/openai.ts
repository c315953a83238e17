/**
 * OpenAI pricing configuration (Standard tier).
 *
 * @see https://platform.openai.com/docs/pricing
 */

import type { ProviderPricing } from '../types.js';
import { createPricingStrategy } from './create-strategy.js';

/**
 * OpenAI model pricing catalog.
 *
 * Prices are in USD per million tokens, or per image for image models.
 * Reasoning tokens are billed at the output rate unless listed.
 */
export const OPENAI_PRICING: ProviderPricing = {
  // GPT-4.1 family
  'gpt-4.1': {
    inputPer1M: 2.0,
    outputPer1M: 8.0,
    cachedInputPer1M: 0.5,
    displayName: 'GPT-4.1',
  },
  'gpt-4.1-mini': {
    inputPer1M: 0.4,
    outputPer1M: 1.6,
    cachedInputPer1M: 0.1,
    displayName: 'GPT-4.1 Mini',
  },
  'gpt-4.1-nano': {
    inputPer1M: 0.1,
    outputPer1M: 0.4,
    cachedInputPer1M: 0.025,
    displayName: 'GPT-4.1 Nano',
  },

  // GPT-4o family
  'gpt-4o': {
    inputPer1M: 2.5,
    outputPer1M: 10.0,
    cachedInputPer1M: 1.25,
    displayName: 'GPT-4o',
  },
  'gpt-4o-mini': {
    inputPer1M: 0.15,
    outputPer1M: 0.6,
    cachedInputPer1M: 0.075,
    displayName: 'GPT-4o Mini',
  },

  // O-series (reasoning models)
  o1: {
    inputPer1M: 15.0,
    outputPer1M: 60.0,
    cachedInputPer1M: 7.5,
    reasoningPer1M: 60.0,
    displayName: 'O1',
  },
  o3: {
    inputPer1M: 2.0,
    outputPer1M: 8.0,
    cachedInputPer1M: 0.5,
    reasoningPer1M: 8.0,
    displayName: 'O3',
  },
  'o3-mini': {
    inputPer1M: 1.1,
    outputPer1M: 4.4,
    cachedInputPer1M: 0.55,
    reasoningPer1M: 4.4,
    displayName: 'O3 Mini',
  },
  'o4-mini': {
    inputPer1M: 1.1,
    outputPer1M: 4.4,
    cachedInputPer1M: 0.275,
    reasoningPer1M: 4.4,
    displayName: 'O4 Mini',
  },

  // Legacy
  'gpt-4-turbo': {
    inputPer1M: 10.0,
    outputPer1M: 30.0,
    displayName: 'GPT-4 Turbo',
  },
  'gpt-3.5-turbo': {
    inputPer1M: 0.5,
    outputPer1M: 1.5,
    displayName: 'GPT-3.5 Turbo',
  },

  // Image generation
  'dall-e-3': {
    kind: 'image',
    perImage: {
      standard: { '1024x1024': 0.04, '1024x1792': 0.08, '1792x1024': 0.08 },
      hd: { '1024x1024': 0.08, '1024x1792': 0.12, '1792x1024': 0.12 },
    },
    displayName: 'DALL-E 3',
  },
  'gpt-image-1': {
    kind: 'image',
    perImage: {
      low: { '1024x1024': 0.011, '1024x1536': 0.016, '1536x1024': 0.016 },
      standard: { '1024x1024': 0.042, '1024x1536': 0.063, '1536x1024': 0.063 },
      high: { '1024x1024': 0.167, '1024x1536': 0.25, '1536x1024': 0.25 },
    },
    displayName: 'GPT Image 1',
  },
};

/**
 * OpenAI model ID aliases.
 */
const OPENAI_ALIASES: Record<string, string> = {
  'chatgpt-4o-latest': 'gpt-4o',
  'gpt-4-turbo-preview': 'gpt-4-turbo',
  'o1-preview': 'o1',
};

/**
 * Pre-configured OpenAI pricing strategy.
 */
export const openaiPricing = createPricingStrategy({
  provider: 'openai',
  catalog: OPENAI_PRICING,
  aliases: OPENAI_ALIASES,
});
