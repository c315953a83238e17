/**
 * Provider factory and registry.
 */

import { UnknownProviderError } from '../errors.js';
import { ClaudeProvider } from './claude.js';
import { GeminiProvider } from './gemini.js';
import { MockProvider } from './mock.js';
import { createGrokProvider, createOpenAIProvider } from './openai.js';
import type { Provider } from './types.js';

export type ProviderFactory = () => Provider;

const BUILTIN_PROVIDERS: Readonly<Record<string, ProviderFactory>> = {
  openai: createOpenAIProvider,
  grok: createGrokProvider,
  claude: () => new ClaudeProvider(),
  gemini: () => new GeminiProvider(),
  mock: () => new MockProvider(),
};

/**
 * Names of the built-in providers.
 */
export function getAvailableProviders(): string[] {
  return Object.keys(BUILTIN_PROVIDERS);
}

/**
 * Create a built-in provider by name.
 *
 * @throws {UnknownProviderError}
 */
export function createProvider(name: string): Provider {
  const factory = BUILTIN_PROVIDERS[name];
  if (!factory) {
    throw new UnknownProviderError(name, getAvailableProviders());
  }
  return factory();
}

/**
 * Named providers, created on first use. Starts with the built-ins.
 */
export class ProviderRegistry {
  private readonly factories: Map<string, ProviderFactory>;
  private readonly instances = new Map<string, Provider>();

  constructor(factories: Readonly<Record<string, ProviderFactory>> = BUILTIN_PROVIDERS) {
    this.factories = new Map(Object.entries(factories));
  }

  /**
   * Add or replace a provider.
   */
  register(name: string, factory: ProviderFactory): void {
    this.factories.set(name, factory);
    this.instances.delete(name);
  }

  get(name: string): Provider {
    const existing = this.instances.get(name);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownProviderError(name, this.list());
    }
    const provider = factory();
    this.instances.set(name, provider);
    return provider;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  list(): string[] {
    return Array.from(this.factories.keys());
  }
}
