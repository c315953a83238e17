/**
 * Google Gemini pricing configuration (paid tier, prompts up to 200k tokens).
 *
 * @see https://ai.google.dev/gemini-api/docs/pricing
 */

import type { ProviderPricing } from '../types.js';
import { createPricingStrategy } from './create-strategy.js';

export const GEMINI_PRICING: ProviderPricing = {
  'gemini-2.5-pro': {
    inputPer1M: 1.25,
    outputPer1M: 10.0,
    cachedInputPer1M: 0.31,
    reasoningPer1M: 10.0,
    displayName: 'Gemini 2.5 Pro',
  },
  'gemini-2.5-flash': {
    inputPer1M: 0.3,
    outputPer1M: 2.5,
    cachedInputPer1M: 0.075,
    reasoningPer1M: 2.5,
    displayName: 'Gemini 2.5 Flash',
  },
  'gemini-2.0-flash': {
    inputPer1M: 0.1,
    outputPer1M: 0.4,
    cachedInputPer1M: 0.025,
    displayName: 'Gemini 2.0 Flash',
  },
  'gemini-2.0-flash-lite': {
    inputPer1M: 0.075,
    outputPer1M: 0.3,
    displayName: 'Gemini 2.0 Flash-Lite',
  },
  'gemini-1.5-pro': {
    inputPer1M: 1.25,
    outputPer1M: 5.0,
    displayName: 'Gemini 1.5 Pro',
  },
  'gemini-1.5-flash': {
    inputPer1M: 0.075,
    outputPer1M: 0.3,
    displayName: 'Gemini 1.5 Flash',
  },
};

export const geminiPricing = createPricingStrategy({
  provider: 'gemini',
  catalog: GEMINI_PRICING,
  aliases: {
    'gemini-pro-latest': 'gemini-2.5-pro',
    'gemini-flash-latest': 'gemini-2.5-flash',
  },
});
