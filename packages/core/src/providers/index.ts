/**
 * Providers Module
 */

export {
  ProviderDispatcher,
  StaticProviderConfigs,
  parseRetryAfter,
  type DispatchOptions,
  type ProviderConfigSource,
  type ProviderDispatcherOptions,
} from './dispatcher.js';

export {
  ProviderRegistry,
  createProvider,
  getAvailableProviders,
  type ProviderFactory,
} from './factory.js';

export { ClaudeProvider, CLAUDE_BASE_URL } from './claude.js';
export { GeminiProvider, GEMINI_BASE_URL } from './gemini.js';
export { MockProvider, MOCK_OUTPUT_TOKENS } from './mock.js';
export {
  OpenAICompatibleProvider,
  OPENAI_BASE_URL,
  GROK_BASE_URL,
  createOpenAIProvider,
  createGrokProvider,
} from './openai.js';

export {
  emptyUsage,
  mapClaudeUsage,
  mapGeminiUsage,
  mapOpenAIUsage,
} from './normalizer.js';

export type { Provider, ProviderReply, WireRequest } from './types.js';
