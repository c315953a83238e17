/**
 * OpenAI-compatible chat completions provider.
 *
 * Serves OpenAI itself and Grok, which speaks the same wire format.
 */

import { z } from 'zod';

import type { ProviderConfig, RequestOptions, ResolvedConfig } from '../types.js';
import { mapOpenAIUsage, parseBody, pickDefined } from './normalizer.js';
import type { Provider, ProviderReply, WireRequest } from './types.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const GROK_BASE_URL = 'https://api.x.ai/v1';

const OPTION_NAMES: Record<string, string> = {
  temperature: 'temperature',
  max_tokens: 'max_tokens',
  max_completion_tokens: 'max_completion_tokens',
  top_p: 'top_p',
  frequency_penalty: 'frequency_penalty',
  presence_penalty: 'presence_penalty',
};

export const chatCompletionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }).passthrough(),
    finish_reason: z.string().nullish(),
  }).passthrough()).min(1),
  usage: z.unknown().optional(),
}).passthrough();

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export class OpenAICompatibleProvider implements Provider {
  constructor(
    readonly name: string,
    readonly defaultBaseUrl: string
  ) {}

  buildRequest(config: ResolvedConfig, providerConfig: ProviderConfig): WireRequest {
    const messages: ChatMessage[] = [];
    if (config.systemPrompt) {
      messages.push({ role: 'system', content: config.systemPrompt });
    }
    messages.push({ role: 'user', content: config.prompt });

    return {
      url: `${providerConfig.baseUrl ?? this.defaultBaseUrl}/chat/completions`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${providerConfig.apiKey}`,
        ...providerConfig.headers,
      },
      body: {
        model: config.model,
        messages,
        ...this.transformOptions(config.options),
      },
    };
  }

  parseResponse(body: unknown): ProviderReply {
    const parsed = parseBody(this.name, chatCompletionSchema, body);
    const [choice] = parsed.choices;
    return {
      content: choice?.message.content ?? '',
      usage: mapOpenAIUsage(parsed.usage),
      meta: {
        id: parsed.id,
        model: parsed.model,
        finishReason: choice?.finish_reason ?? undefined,
      },
    };
  }

  transformOptions(options: Readonly<RequestOptions>): RequestOptions {
    return pickDefined(options, OPTION_NAMES);
  }
}

export function createOpenAIProvider(): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider('openai', OPENAI_BASE_URL);
}

export function createGrokProvider(): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider('grok', GROK_BASE_URL);
}
