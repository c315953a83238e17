/**
 * Anthropic Messages API provider.
 */

import { z } from 'zod';

import { ANTHROPIC_API_VERSION, DEFAULT_CLAUDE_MAX_TOKENS } from '../constants.js';
import type { ProviderConfig, RequestOptions, ResolvedConfig } from '../types.js';
import { mapClaudeUsage, parseBody, pickDefined } from './normalizer.js';
import type { Provider, ProviderReply, WireRequest } from './types.js';

export const CLAUDE_BASE_URL = 'https://api.anthropic.com/v1';

const messageSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  stop_reason: z.string().nullish(),
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  }).passthrough()),
  usage: z.unknown().optional(),
}).passthrough();

export class ClaudeProvider implements Provider {
  readonly name = 'claude';
  readonly defaultBaseUrl = CLAUDE_BASE_URL;

  buildRequest(config: ResolvedConfig, providerConfig: ProviderConfig): WireRequest {
    const body: Record<string, unknown> = {
      model: config.model,
      messages: [{ role: 'user', content: config.prompt }],
      ...this.transformOptions(config.options),
    };
    if (config.systemPrompt) {
      body.system = config.systemPrompt;
    }

    return {
      url: `${providerConfig.baseUrl ?? this.defaultBaseUrl}/messages`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': providerConfig.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
        ...providerConfig.headers,
      },
      body,
    };
  }

  parseResponse(body: unknown): ProviderReply {
    const parsed = parseBody(this.name, messageSchema, body);
    const content = parsed.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    return {
      content,
      usage: mapClaudeUsage(parsed.usage),
      meta: {
        id: parsed.id,
        model: parsed.model,
        finishReason: parsed.stop_reason ?? undefined,
      },
    };
  }

  /**
   * The Messages API rejects requests without `max_tokens`.
   */
  transformOptions(options: Readonly<RequestOptions>): RequestOptions {
    const maxTokens = options.max_tokens ?? options.max_completion_tokens;
    return {
      max_tokens: typeof maxTokens === 'number' ? maxTokens : DEFAULT_CLAUDE_MAX_TOKENS,
      ...pickDefined(options, { temperature: 'temperature', top_p: 'top_p' }),
    };
  }
}
