/**
 * Factory for creating pricing strategies from catalogs.
 */

import { z } from 'zod';

import type { ModelPricing, ProviderPricing, PricingStrategy } from '../types.js';

const textPricingSchema = z.object({
  kind: z.literal('text').optional(),
  inputPer1M: z.number().nonnegative(),
  outputPer1M: z.number().nonnegative(),
  cachedInputPer1M: z.number().nonnegative().optional(),
  reasoningPer1M: z.number().nonnegative().optional(),
  displayName: z.string().optional(),
});

const imagePricingSchema = z.object({
  kind: z.literal('image'),
  perImage: z.record(z.record(z.number().nonnegative())),
  displayName: z.string().optional(),
});

/**
 * Schema for catalogs supplied at runtime (config files, model registries).
 */
export const providerPricingSchema = z.record(z.union([imagePricingSchema, textPricingSchema]));

/**
 * Internal implementation of PricingStrategy.
 */
class PricingStrategyImpl implements PricingStrategy {
  readonly provider: string;
  private readonly catalog: ProviderPricing;
  private readonly aliases: Map<string, string>;
  /** Catalog keys, longest first, for prefix matching */
  private readonly prefixes: string[];

  constructor(provider: string, catalog: ProviderPricing, aliases?: Record<string, string>) {
    this.provider = provider;
    this.catalog = catalog;
    this.aliases = new Map(Object.entries(aliases ?? {}));
    this.prefixes = Object.keys(catalog).sort((a, b) => b.length - a.length);
  }

  getPricing(modelId: string): ModelPricing | undefined {
    const direct = this.catalog[modelId];
    if (direct) {
      return direct;
    }

    const aliasedId = this.aliases.get(modelId);
    if (aliasedId && this.catalog[aliasedId]) {
      return this.catalog[aliasedId];
    }

    // Dated snapshots: "gpt-4.1-mini-2025-04-14" prices as "gpt-4.1-mini"
    for (const key of this.prefixes) {
      if (modelId.startsWith(`${key}-`)) {
        return this.catalog[key];
      }
    }

    return undefined;
  }

  listModels(): string[] {
    return Object.keys(this.catalog);
  }

  hasModel(modelId: string): boolean {
    return this.getPricing(modelId) !== undefined;
  }
}

/**
 * Options for creating a pricing strategy.
 */
export interface CreatePricingStrategyOptions {
  /** Provider name */
  provider: string;
  /** Pricing catalog */
  catalog: ProviderPricing;
  /** Model ID aliases */
  aliases?: Record<string, string>;
}

/**
 * Create a pricing strategy from a catalog.
 */
export function createPricingStrategy(options: CreatePricingStrategyOptions): PricingStrategy {
  return new PricingStrategyImpl(options.provider, options.catalog, options.aliases);
}

/**
 * Create a pricing strategy from untrusted catalog data.
 *
 * @throws {z.ZodError} when the catalog does not match the pricing schema
 */
export function parsePricingStrategy(
  provider: string,
  catalog: unknown,
  aliases?: Record<string, string>
): PricingStrategy {
  return createPricingStrategy({
    provider,
    catalog: providerPricingSchema.parse(catalog),
    aliases,
  });
}
