/**
 * Cache Key Derivation
 */

import { createHash } from 'node:crypto';

import { NON_SEMANTIC_OPTION_KEYS } from '../constants.js';
import type { RequestOptions } from '../types.js';
import { sortKeysDeep, stableStringify } from '../utils/stable-json.js';

const NON_SEMANTIC = new Set<string>(NON_SEMANTIC_OPTION_KEYS);

/**
 * Drop options that do not change the upstream answer and sort the rest.
 */
export function normalizeOptions(options: Readonly<RequestOptions>): RequestOptions {
  const kept: RequestOptions = {};
  for (const key of Object.keys(options).sort()) {
    const value = options[key];
    if (!NON_SEMANTIC.has(key) && value !== undefined) {
      kept[key] = sortKeysDeep(value);
    }
  }
  return kept;
}

/**
 * Build the cache key for a request.
 *
 * `{prefix}:{provider}:{model}:{sha256 of prompt and normalized options}`.
 * A system prompt, when present, is hashed with the prompt.
 */
export function buildCacheKey(
  prefix: string,
  provider: string,
  model: string,
  prompt: string,
  options: Readonly<RequestOptions>,
  systemPrompt?: string
): string {
  const content = systemPrompt === undefined
    ? { prompt, options: normalizeOptions(options) }
    : { prompt, system: systemPrompt, options: normalizeOptions(options) };
  const digest = createHash('sha256').update(stableStringify(content)).digest('hex');
  return `${prefix}:${provider}:${model}:${digest}`;
}

/**
 * Tags attached to an entry for bulk invalidation.
 */
export function buildCacheTags(baseTags: readonly string[], provider: string, model: string): string[] {
  return [
    ...baseTags,
    `provider:${provider}`,
    `model:${model}`,
    `provider-model:${provider}:${model}`,
  ];
}
