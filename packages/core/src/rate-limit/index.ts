/**
 * Rate Limit Module
 */

export type {
  CounterStore,
  DimensionCounts,
  RateLimitConfig,
  RateLimitDecision,
  RateLimitDimension,
  RateLimitRules,
  TokenEstimator,
} from './types.js';

export {
  RateLimiter,
  DEFAULT_RATE_LIMIT_RULES,
  estimateTokensByLength,
} from './rate-limiter.js';
export type { RateLimiterOptions } from './rate-limiter.js';

export { MemoryCounterStore } from './memory-counter-store.js';
export { FileCounterStore } from './file-counter-store.js';
export type { FileCounterStoreOptions } from './file-counter-store.js';
