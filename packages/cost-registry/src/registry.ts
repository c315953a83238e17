/**
 * CostRegistry - Unified cost calculation for multiple providers.
 */

import type {
  CostCalculationInput,
  CostResult,
  CurrencySettings,
  ImageCostOptions,
  ModelPricing,
  PricingStrategy,
  TextModelPricing,
  TokenUsage,
} from './types.js';
import { parsePricingStrategy } from './rates/create-strategy.js';
import { anthropicPricing } from './rates/anthropic.js';
import { geminiPricing } from './rates/gemini.js';
import { grokPricing } from './rates/grok.js';
import { openaiPricing } from './rates/openai.js';

const TOKENS_PER_RATE_UNIT = 1_000_000;

const DEFAULT_IMAGE_QUALITY = 'standard';
const DEFAULT_IMAGE_SIZE = '1024x1024';

/**
 * Default display settings: plain USD, six decimals.
 */
export const DEFAULT_CURRENCY_SETTINGS: CurrencySettings = {
  currency: 'USD',
  exchangeRate: 1,
  decimalPlaces: 6,
};

/**
 * Round half away from zero to a fixed number of decimals.
 */
export function roundTo(value: number, decimalPlaces: number): number {
  const factor = 10 ** decimalPlaces;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

function isTextPricing(pricing: ModelPricing): pricing is TextModelPricing {
  return pricing.kind !== 'image';
}

/**
 * CostRegistry - Single source of truth for cost calculation.
 *
 * Unknown models never fail a request: their cost is 0 and
 * `priced` is false on the result.
 *
 * @example
 * ```typescript
 * const registry = CostRegistry.default({ currency: 'JPY', exchangeRate: 150, decimalPlaces: 2 });
 *
 * registry.cost('gpt-4.1-mini', 1000, 500);          // 0.18
 * registry.imageCost('dall-e-3', { quality: 'hd' }); // 12
 * ```
 */
export class CostRegistry {
  private strategies: Map<string, PricingStrategy> = new Map();
  private readonly settings: CurrencySettings;

  constructor(settings: Partial<CurrencySettings> = {}) {
    this.settings = { ...DEFAULT_CURRENCY_SETTINGS, ...settings };
  }

  /**
   * Create a CostRegistry with the built-in provider catalogs.
   */
  static default(settings: Partial<CurrencySettings> = {}): CostRegistry {
    const registry = new CostRegistry(settings);
    registry.registerStrategy(openaiPricing);
    registry.registerStrategy(anthropicPricing);
    registry.registerStrategy(geminiPricing);
    registry.registerStrategy(grokPricing);
    return registry;
  }

  /**
   * Create an empty CostRegistry.
   */
  static empty(settings: Partial<CurrencySettings> = {}): CostRegistry {
    return new CostRegistry(settings);
  }

  /**
   * Register a pricing strategy for a provider. Replaces any earlier one.
   */
  registerStrategy(strategy: PricingStrategy): void {
    this.strategies.set(strategy.provider, strategy);
  }

  /**
   * Register a catalog read at runtime (config file, remote price list).
   *
   * @throws {z.ZodError} when the catalog does not match the pricing schema
   */
  registerCatalog(provider: string, catalog: unknown, aliases?: Record<string, string>): void {
    this.registerStrategy(parsePricingStrategy(provider, catalog, aliases));
  }

  get currency(): string {
    return this.settings.currency;
  }

  getSettings(): CurrencySettings {
    return { ...this.settings };
  }

  /**
   * Find pricing for a model, optionally restricted to one provider.
   */
  getPricing(model: string, provider?: string): ModelPricing | undefined {
    if (provider !== undefined) {
      const strategy = this.strategies.get(provider);
      const pricing = strategy?.getPricing(model);
      if (pricing) {
        return pricing;
      }
    }

    for (const strategy of this.strategies.values()) {
      const pricing = strategy.getPricing(model);
      if (pricing) {
        return pricing;
      }
    }
    return undefined;
  }

  hasPricing(model: string, provider?: string): boolean {
    return this.getPricing(model, provider) !== undefined;
  }

  /**
   * Calculate the full cost breakdown for a text model call.
   */
  calculate(input: CostCalculationInput): CostResult {
    const pricing = this.getPricing(input.model, input.provider);
    if (!pricing || !isTextPricing(pricing)) {
      return this.zero();
    }

    const { usage } = input;
    const inputCost = (usage.inputTokens / TOKENS_PER_RATE_UNIT) * pricing.inputPer1M;
    const outputCost = (usage.outputTokens / TOKENS_PER_RATE_UNIT) * pricing.outputPer1M;
    const cachedInputCost = pricing.cachedInputPer1M !== undefined
      ? ((usage.cachedInputTokens ?? 0) / TOKENS_PER_RATE_UNIT) * pricing.cachedInputPer1M
      : 0;
    const reasoningCost = pricing.reasoningPer1M !== undefined
      ? ((usage.reasoningTokens ?? 0) / TOKENS_PER_RATE_UNIT) * pricing.reasoningPer1M
      : 0;

    return {
      inputCost,
      outputCost,
      cachedInputCost,
      reasoningCost,
      totalCost: this.convert(inputCost + outputCost + cachedInputCost + reasoningCost),
      currency: this.settings.currency,
      priced: true,
    };
  }

  /**
   * Total cost of a text model call in the display currency.
   */
  cost(
    model: string,
    inputTokens: number,
    outputTokens: number,
    cachedTokens = 0,
    reasoningTokens = 0
  ): number {
    const usage: TokenUsage = {
      inputTokens,
      outputTokens,
      cachedInputTokens: cachedTokens,
      reasoningTokens,
    };
    return this.calculate({ model, usage }).totalCost;
  }

  /**
   * Estimate cost before a call from expected token counts.
   */
  estimateCost(model: string, estimatedInputTokens: number, estimatedOutputTokens: number): number {
    return this.cost(model, estimatedInputTokens, estimatedOutputTokens);
  }

  /**
   * Cost of generating images, in the display currency.
   *
   * Unknown quality or size combinations cost 0.
   */
  imageCost(model: string, options: ImageCostOptions = {}): number {
    const pricing = this.getPricing(model);
    if (!pricing || isTextPricing(pricing)) {
      return 0;
    }

    const quality = options.quality ?? DEFAULT_IMAGE_QUALITY;
    const size = options.size ?? DEFAULT_IMAGE_SIZE;
    const perImage = pricing.perImage[quality]?.[size] ?? 0;
    return this.convert(perImage * (options.count ?? 1));
  }

  /**
   * Get a pricing strategy by provider name.
   */
  getStrategy(provider: string): PricingStrategy | undefined {
    return this.strategies.get(provider);
  }

  hasProvider(provider: string): boolean {
    return this.strategies.has(provider);
  }

  listProviders(): string[] {
    return Array.from(this.strategies.keys());
  }

  private convert(usd: number): number {
    return roundTo(usd * this.settings.exchangeRate, this.settings.decimalPlaces);
  }

  private zero(): CostResult {
    return {
      inputCost: 0,
      outputCost: 0,
      cachedInputCost: 0,
      reasoningCost: 0,
      totalCost: 0,
      currency: this.settings.currency,
      priced: false,
    };
  }
}
