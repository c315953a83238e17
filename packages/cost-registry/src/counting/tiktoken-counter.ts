/**
 * Tiktoken-based token counter.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

import type { TiktokenEncoding, TokenCounter, TokenCounterOptions } from './types.js';

/**
 * Default encoding for token counting.
 */
const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

/**
 * Model name prefixes that use the o200k encoding.
 */
const O200K_MODEL_PREFIXES = ['gpt-4o', 'gpt-4.1', 'gpt-5', 'o1', 'o3', 'o4'];

/**
 * Pick the encoding for a model name. Non-OpenAI models get the default,
 * which is close enough for estimates.
 */
export function encodingForModel(model: string): TiktokenEncoding {
  return O200K_MODEL_PREFIXES.some((prefix) => model.startsWith(prefix))
    ? 'o200k_base'
    : DEFAULT_ENCODING;
}

/**
 * Create a tiktoken-based token counter.
 *
 * The encoder is loaded on first use.
 */
export function createTokenCounter(options: TokenCounterOptions = {}): TokenCounter {
  const encoding = options.encoding
    ?? (options.model ? encodingForModel(options.model) : DEFAULT_ENCODING);
  let encoder: Tiktoken | null = null;

  const count = (text: string): number => {
    if (!text) return 0;
    if (!encoder) {
      encoder = getEncoding(encoding);
    }
    return encoder.encode(text).length;
  };

  return Object.assign(count, { encoding });
}
