/**
 * Constants
 *
 * Centralized configuration defaults for promptgate.
 */

// =============================================================================
// Request Defaults
// =============================================================================

/** Provider used when neither the request nor the preset names one */
export const DEFAULT_PROVIDER = 'openai';

/** Model used when neither the request nor the preset names one */
export const DEFAULT_MODEL = 'gpt-4.1-mini';

/** Preset used when a request names none */
export const DEFAULT_PRESET_NAME = 'default';

/** Generation options applied beneath preset and request options */
export const DEFAULT_OPTIONS = {
  temperature: 0.7,
  top_p: 0.95,
  max_tokens: 2000,
  presence_penalty: 0,
  frequency_penalty: 0,
} as const;

// =============================================================================
// HTTP Defaults
// =============================================================================

/** Default timeout for provider requests in milliseconds */
export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

/** Anthropic API version header value */
export const ANTHROPIC_API_VERSION = '2023-06-01';

/** API key references used when a provider's config names none */
export const DEFAULT_PROVIDER_API_KEYS: Readonly<Record<string, string>> = {
  openai: '$OPENAI_API_KEY',
  claude: '$ANTHROPIC_API_KEY',
  gemini: '$GEMINI_API_KEY',
  grok: '$GROK_API_KEY',
};

/** Claude requires max_tokens; used when the request has none */
export const DEFAULT_CLAUDE_MAX_TOKENS = 4096;

// =============================================================================
// Retry Defaults
// =============================================================================

/** Total attempts including the first one */
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;

/** Delay before the first retry in milliseconds */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/** Backoff multiplier applied per attempt */
export const DEFAULT_RETRY_MULTIPLIER = 2;

/** Error kinds retried by default */
export const DEFAULT_RETRYABLE_KINDS = ['rate_limit', 'timeout', 'connection'] as const;

// =============================================================================
// Cache Defaults
// =============================================================================

/** Default cache TTL in seconds */
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

/** Default cache key prefix */
export const DEFAULT_CACHE_PREFIX = 'genai_cache';

/** Tags attached to every cache entry */
export const DEFAULT_CACHE_TAGS = ['genai'] as const;

/** Option keys that never change the upstream answer */
export const NON_SEMANTIC_OPTION_KEYS = ['stream', 'async', 'timeout'] as const;

/** Minimum time between sweeps of expired entries in the in-memory stores */
export const EXPIRED_SWEEP_INTERVAL_MS = 60_000;

// =============================================================================
// Rate Limit Defaults
// =============================================================================

/** Length of a minute window in seconds */
export const RATE_LIMIT_WINDOW_SECONDS = 60;

/** TTL for daily counters in seconds */
export const RATE_LIMIT_DAILY_TTL_SECONDS = 86400;

/** Characters per token for pre-dispatch estimates */
export const CHARS_PER_TOKEN = 4;

/** Counter file for the file-backed store */
export const DEFAULT_RATE_LIMIT_FILE = '.promptgate/rate-limits.json';

/** Caller identity when none is supplied */
export const DEFAULT_CALLER_ID = 'anonymous';

// =============================================================================
// Pricing Defaults
// =============================================================================

/** Display currency */
export const DEFAULT_CURRENCY = 'USD';

/** Multiplier from USD to the display currency */
export const DEFAULT_EXCHANGE_RATE = 1;

/** Decimal places kept for costs */
export const DEFAULT_DECIMAL_PLACES = 6;

// =============================================================================
// Batch Defaults
// =============================================================================

/** Maximum number of concurrent requests in batch mode */
export const DEFAULT_BATCH_CONCURRENCY = 4;
