/**
 * Anthropic pricing configuration.
 *
 * @see https://docs.anthropic.com/en/docs/about-claude/pricing
 */

import type { ProviderPricing } from '../types.js';
import { createPricingStrategy } from './create-strategy.js';

/**
 * Anthropic model pricing catalog.
 *
 * Prices are in USD per million tokens (MTok).
 * Cached input is the cache-read rate.
 */
export const ANTHROPIC_PRICING: ProviderPricing = {
  'claude-opus-4': {
    inputPer1M: 15.0,
    outputPer1M: 75.0,
    cachedInputPer1M: 1.5,
    displayName: 'Claude Opus 4',
  },
  'claude-sonnet-4': {
    inputPer1M: 3.0,
    outputPer1M: 15.0,
    cachedInputPer1M: 0.3,
    displayName: 'Claude Sonnet 4',
  },
  'claude-3-7-sonnet': {
    inputPer1M: 3.0,
    outputPer1M: 15.0,
    cachedInputPer1M: 0.3,
    displayName: 'Claude Sonnet 3.7',
  },
  'claude-3-5-sonnet': {
    inputPer1M: 3.0,
    outputPer1M: 15.0,
    cachedInputPer1M: 0.3,
    displayName: 'Claude Sonnet 3.5',
  },
  'claude-3-5-haiku': {
    inputPer1M: 0.8,
    outputPer1M: 4.0,
    cachedInputPer1M: 0.08,
    displayName: 'Claude Haiku 3.5',
  },
  'claude-3-haiku': {
    inputPer1M: 0.25,
    outputPer1M: 1.25,
    cachedInputPer1M: 0.03,
    displayName: 'Claude Haiku 3',
  },
};

/**
 * Anthropic model ID aliases.
 */
const ANTHROPIC_ALIASES: Record<string, string> = {
  'claude-opus-4-0': 'claude-opus-4',
  'claude-sonnet-4-0': 'claude-sonnet-4',
};

/**
 * Pre-configured Anthropic pricing strategy.
 *
 * Registered under `claude`, the provider name the dispatcher uses.
 */
export const anthropicPricing = createPricingStrategy({
  provider: 'claude',
  catalog: ANTHROPIC_PRICING,
  aliases: ANTHROPIC_ALIASES,
});
