/**
 * Token counting exports.
 */

export type { TiktokenEncoding, TokenCounterOptions, TokenCounter } from './types.js';

export { createTokenCounter, encodingForModel } from './tiktoken-counter.js';
