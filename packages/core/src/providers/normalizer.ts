/**
 * Normalizer
 *
 * Maps each provider's usage block onto Usage and extracts reply text.
 */

import { z } from 'zod';

import { ProviderRequestError } from '../errors.js';
import type { Usage } from '../types.js';

const count = z.number().int().nonnegative().optional();

const tokenDetails = z.object({
  cached_tokens: count,
  reasoning_tokens: count,
}).passthrough().nullish();

/**
 * OpenAI chat completions (`prompt_tokens`) and responses (`input_tokens`) usage.
 */
export const openAIUsageSchema = z.object({
  prompt_tokens: count,
  completion_tokens: count,
  input_tokens: count,
  output_tokens: count,
  total_tokens: count,
  prompt_tokens_details: tokenDetails,
  input_tokens_details: tokenDetails,
  completion_tokens_details: tokenDetails,
  output_tokens_details: tokenDetails,
}).passthrough();

export const claudeUsageSchema = z.object({
  input_tokens: count,
  output_tokens: count,
  cache_read_input_tokens: count,
}).passthrough();

export const geminiUsageSchema = z.object({
  promptTokenCount: count,
  candidatesTokenCount: count,
  totalTokenCount: count,
  cachedContentTokenCount: count,
  thoughtsTokenCount: count,
}).passthrough();

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    cachedTokens: 0,
    reasoningTokens: 0,
  };
}

function buildUsage(
  inputTokens: number,
  outputTokens: number,
  totalTokens: number | undefined,
  cachedTokens: number,
  reasoningTokens: number
): Usage {
  return {
    inputTokens,
    outputTokens,
    totalTokens: totalTokens ?? inputTokens + outputTokens,
    cachedTokens,
    reasoningTokens,
  };
}

export function mapOpenAIUsage(raw: unknown): Usage {
  const parsed = openAIUsageSchema.safeParse(raw);
  if (!parsed.success) {
    return emptyUsage();
  }
  const usage = parsed.data;
  return buildUsage(
    usage.prompt_tokens ?? usage.input_tokens ?? 0,
    usage.completion_tokens ?? usage.output_tokens ?? 0,
    usage.total_tokens,
    usage.prompt_tokens_details?.cached_tokens ?? usage.input_tokens_details?.cached_tokens ?? 0,
    usage.completion_tokens_details?.reasoning_tokens ?? usage.output_tokens_details?.reasoning_tokens ?? 0
  );
}

export function mapClaudeUsage(raw: unknown): Usage {
  const parsed = claudeUsageSchema.safeParse(raw);
  if (!parsed.success) {
    return emptyUsage();
  }
  const usage = parsed.data;
  return buildUsage(
    usage.input_tokens ?? 0,
    usage.output_tokens ?? 0,
    undefined,
    usage.cache_read_input_tokens ?? 0,
    0
  );
}

export function mapGeminiUsage(raw: unknown): Usage {
  const parsed = geminiUsageSchema.safeParse(raw);
  if (!parsed.success) {
    return emptyUsage();
  }
  const usage = parsed.data;
  return buildUsage(
    usage.promptTokenCount ?? 0,
    usage.candidatesTokenCount ?? 0,
    usage.totalTokenCount,
    usage.cachedContentTokenCount ?? 0,
    usage.thoughtsTokenCount ?? 0
  );
}

/**
 * Parse a response body against a schema or raise a malformed-response error.
 */
export function parseBody<T extends z.ZodTypeAny>(provider: string, schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected shape';
    throw new ProviderRequestError(`Malformed ${provider} response (${where})`, {
      provider,
      body: JSON.stringify(body) ?? '',
      kind: 'malformed',
    });
  }
  return parsed.data;
}

/**
 * Copy options that are set, skipping null and undefined.
 */
export function pickDefined(
  options: Readonly<Record<string, unknown>>,
  mapping: Readonly<Record<string, string>>
): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const [from, to] of Object.entries(mapping)) {
    const value = options[from];
    if (value !== undefined && value !== null) {
      picked[to] = value;
    }
  }
  return picked;
}
