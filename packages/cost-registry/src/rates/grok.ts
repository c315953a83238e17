/**
 * xAI Grok pricing configuration.
 *
 * @see https://docs.x.ai/docs/models
 */

import type { ProviderPricing } from '../types.js';
import { createPricingStrategy } from './create-strategy.js';

export const GROK_PRICING: ProviderPricing = {
  'grok-3': {
    inputPer1M: 3.0,
    outputPer1M: 15.0,
    cachedInputPer1M: 0.75,
    displayName: 'Grok 3',
  },
  'grok-3-mini': {
    inputPer1M: 0.3,
    outputPer1M: 0.5,
    cachedInputPer1M: 0.075,
    reasoningPer1M: 0.5,
    displayName: 'Grok 3 Mini',
  },
  'grok-4': {
    inputPer1M: 3.0,
    outputPer1M: 15.0,
    cachedInputPer1M: 0.75,
    reasoningPer1M: 15.0,
    displayName: 'Grok 4',
  },
};

export const grokPricing = createPricingStrategy({
  provider: 'grok',
  catalog: GROK_PRICING,
  aliases: { 'grok-beta': 'grok-3' },
});
