/**
 * Request and response types shared across the pipeline.
 */

/**
 * Provider-neutral generation options (`temperature`, `max_tokens`, ...).
 */
export type RequestOptions = Record<string, unknown>;

/**
 * Template variables substituted into `{{name}}` placeholders.
 */
export type TemplateVars = Record<string, string>;

/**
 * A caller's request, before presets and defaults are applied.
 */
export interface RequestSpec {
  prompt: string;
  systemPrompt?: string;
  provider?: string;
  model?: string;
  options?: RequestOptions;
  vars?: TemplateVars;
  /** Carried through resolution; responses are always returned whole */
  stream?: boolean;
  /** Preset to start from (default: "default") */
  presetName?: string;
}

/**
 * Named bundle of provider, model, system prompt and options.
 */
export interface Preset {
  name: string;
  provider: string;
  model: string;
  systemPrompt?: string;
  options: RequestOptions;
}

/**
 * Fully merged request configuration. Frozen once built.
 */
export interface ResolvedConfig {
  readonly provider: string;
  readonly model: string;
  readonly prompt: string;
  readonly systemPrompt?: string;
  readonly options: Readonly<RequestOptions>;
  readonly vars: Readonly<TemplateVars>;
  readonly stream: boolean;
}

/**
 * Connection settings for one provider.
 */
export interface ProviderConfig {
  apiKey: string;
  /** Overrides the provider's default base URL */
  baseUrl?: string;
  /** Extra headers sent with every request */
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * Token usage reported by a provider.
 */
export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cachedTokens: number;
  reasoningTokens: number;
}

/**
 * Provider-neutral response returned for every call, successful or not.
 */
export interface NormalizedResponse {
  content: string;
  usage: Usage;
  /** Cost in the configured display currency; 0 when `error` is set */
  cost: number;
  meta: Record<string, unknown>;
  cached: boolean;
  responseTimeMs: number;
  /** Set on failure; `content` is then empty */
  error?: string;
}

/**
 * What the cache stores for a response.
 */
export interface CacheEntry {
  content: string;
  usage: Usage;
  cost: number;
  meta: Record<string, unknown>;
}

/**
 * Clock used for windows, TTLs and durations.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
