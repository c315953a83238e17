/**
 * Local provider for demos and tests. Never touches the network.
 */

import { CHARS_PER_TOKEN } from '../constants.js';
import type { ResolvedConfig } from '../types.js';
import { OpenAICompatibleProvider } from './openai.js';

export const MOCK_OUTPUT_TOKENS = 20;

export class MockProvider extends OpenAICompatibleProvider {
  readonly local = true;

  constructor() {
    super('mock', 'mock://local');
  }

  /**
   * Reply in the chat completions shape so the regular parser applies.
   */
  async respond(config: ResolvedConfig): Promise<unknown> {
    let content = `Mock response to: ${config.prompt}`;
    if (config.systemPrompt) {
      content += ` (System: ${config.systemPrompt})`;
    }
    const promptTokens = Math.floor(config.prompt.length / CHARS_PER_TOKEN);

    return {
      id: `mock-${config.model}`,
      model: config.model,
      choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: MOCK_OUTPUT_TOKENS,
        total_tokens: promptTokens + MOCK_OUTPUT_TOKENS,
      },
    };
  }
}
