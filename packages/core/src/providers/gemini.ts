/**
 * Google Gemini generateContent provider.
 */

import { z } from 'zod';

import type { ProviderConfig, RequestOptions, ResolvedConfig } from '../types.js';
import { mapGeminiUsage, parseBody, pickDefined } from './normalizer.js';
import type { Provider, ProviderReply, WireRequest } from './types.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const generateContentSchema = z.object({
  modelVersion: z.string().optional(),
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
    }).passthrough().optional(),
    finishReason: z.string().optional(),
  }).passthrough()).min(1),
  usageMetadata: z.unknown().optional(),
}).passthrough();

interface GeminiContent {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

export class GeminiProvider implements Provider {
  readonly name = 'gemini';
  readonly defaultBaseUrl = GEMINI_BASE_URL;

  buildRequest(config: ResolvedConfig, providerConfig: ProviderConfig): WireRequest {
    const contents: GeminiContent[] = [];
    // generateContent has no system role in `contents`
    if (config.systemPrompt) {
      contents.push({ role: 'model', parts: [{ text: config.systemPrompt }] });
    }
    contents.push({ role: 'user', parts: [{ text: config.prompt }] });

    const base = providerConfig.baseUrl ?? this.defaultBaseUrl;
    const model = encodeURIComponent(config.model);

    return {
      url: `${base}/models/${model}:generateContent?key=${encodeURIComponent(providerConfig.apiKey)}`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...providerConfig.headers,
      },
      body: {
        contents,
        generationConfig: this.transformOptions(config.options),
      },
    };
  }

  parseResponse(body: unknown): ProviderReply {
    const parsed = parseBody(this.name, generateContentSchema, body);
    const [candidate] = parsed.candidates;
    const content = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    return {
      content,
      usage: mapGeminiUsage(parsed.usageMetadata),
      meta: {
        model: parsed.modelVersion,
        finishReason: candidate?.finishReason,
      },
    };
  }

  transformOptions(options: Readonly<RequestOptions>): RequestOptions {
    return pickDefined(options, {
      temperature: 'temperature',
      max_tokens: 'maxOutputTokens',
      top_p: 'topP',
    });
  }
}
