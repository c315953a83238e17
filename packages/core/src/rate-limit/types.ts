/**
 * Rate Limit Types
 */

/**
 * Limits for one scope. A missing or zero value disables that dimension.
 */
export interface RateLimitConfig {
  requestsPerMinute?: number;
  tokensPerMinute?: number;
  requestsPerDay?: number;
}

export type RateLimitDimension = keyof RateLimitConfig;

/**
 * Limits at every level. Most specific wins: model, then provider, then default.
 */
export interface RateLimitRules {
  default: RateLimitConfig;
  providers?: Record<string, RateLimitConfig>;
  models?: Record<string, RateLimitConfig>;
}

/**
 * Per-dimension counts, limits or remaining allowances.
 */
export type DimensionCounts = Partial<Record<RateLimitDimension, number>>;

/**
 * Outcome of an admission check.
 */
export interface RateLimitDecision {
  allowed: boolean;
  /** Remaining allowance for each enforced dimension */
  remaining: DimensionCounts;
  /** Counts in the current windows */
  current: Required<DimensionCounts>;
  /** Enforced limits */
  limits: DimensionCounts;
  /** Epoch milliseconds when the minute window rolls over */
  resetAt: number;
  /** First dimension that denied the request */
  deniedBy?: RateLimitDimension;
}

/**
 * Counter backend. `increment` must be atomic: it creates the counter
 * with the given TTL when absent and returns the new value.
 */
export interface CounterStore {
  get(key: string): Promise<number>;
  increment(key: string, by: number, ttlSeconds: number): Promise<number>;
  delete(key: string): Promise<void>;
}

/**
 * Estimates tokens in a prompt before dispatch.
 */
export type TokenEstimator = (text: string) => number;
