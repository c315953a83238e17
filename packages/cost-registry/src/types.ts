/**
 * Core types for the cost registry.
 */

/**
 * Token usage from a single LLM call.
 */
export interface TokenUsage {
  /** Number of input (prompt) tokens consumed */
  inputTokens: number;
  /** Number of output (completion) tokens generated */
  outputTokens: number;
  /** Number of input tokens served from the provider's prompt cache */
  cachedInputTokens?: number;
  /** Number of reasoning tokens (billed separately by some providers) */
  reasoningTokens?: number;
}

/**
 * Pricing for a token-billed text model.
 */
export interface TextModelPricing {
  kind?: 'text';
  /** Cost per 1 million input tokens (USD) */
  inputPer1M: number;
  /** Cost per 1 million output tokens (USD) */
  outputPer1M: number;
  /** Cost per 1 million cached input tokens (USD) */
  cachedInputPer1M?: number;
  /** Cost per 1 million reasoning tokens (USD) */
  reasoningPer1M?: number;
  /** Human-readable display name */
  displayName?: string;
}

/**
 * Per-image price table, keyed by quality then by size (e.g. `hd` -> `1024x1792`).
 */
export type ImagePriceTable = Record<string, Record<string, number>>;

/**
 * Pricing for an image generation model.
 */
export interface ImageModelPricing {
  kind: 'image';
  perImage: ImagePriceTable;
  displayName?: string;
}

/**
 * Pricing configuration for a single model.
 */
export type ModelPricing = TextModelPricing | ImageModelPricing;

/**
 * Pricing catalog mapping model IDs to their pricing.
 */
export interface ProviderPricing {
  [modelId: string]: ModelPricing;
}

/**
 * Cost calculation result.
 *
 * Part costs are in USD; `totalCost` is converted to `currency` and rounded.
 */
export interface CostResult {
  inputCost: number;
  outputCost: number;
  cachedInputCost: number;
  reasoningCost: number;
  /** Total in the display currency */
  totalCost: number;
  currency: string;
  /** False when no pricing was found for the model */
  priced: boolean;
}

/**
 * Input for cost calculation.
 */
export interface CostCalculationInput {
  /** Provider name; when omitted every registered catalog is searched */
  provider?: string;
  model: string;
  usage: TokenUsage;
}

/**
 * Options for image cost calculation.
 */
export interface ImageCostOptions {
  quality?: string;
  size?: string;
  count?: number;
}

/**
 * Display currency settings.
 */
export interface CurrencySettings {
  /** Currency code shown to callers (default: USD) */
  currency: string;
  /** Multiplier applied to USD amounts */
  exchangeRate: number;
  /** Decimal places kept after conversion */
  decimalPlaces: number;
}

/**
 * Pricing strategy interface for provider-specific pricing.
 */
export interface PricingStrategy {
  /** Provider name */
  readonly provider: string;

  /**
   * Get pricing configuration for a model.
   */
  getPricing(modelId: string): ModelPricing | undefined;

  /**
   * List all available model IDs.
   */
  listModels(): string[];

  /**
   * Check if a model ID is supported.
   */
  hasModel(modelId: string): boolean;
}
