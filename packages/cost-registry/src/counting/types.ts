/**
 * Token counting types.
 */

/**
 * Tiktoken encodings supported by the counter.
 */
export type TiktokenEncoding = 'cl100k_base' | 'o200k_base' | 'p50k_base' | 'r50k_base';

/**
 * Options for creating a token counter.
 */
export interface TokenCounterOptions {
  /** Explicit encoding (wins over `model`) */
  encoding?: TiktokenEncoding;
  /** Model name used to pick an encoding when `encoding` is not given */
  model?: string;
}

/**
 * Counts tokens in a piece of text.
 */
export interface TokenCounter {
  (text: string): number;
  /** The encoding this counter uses */
  readonly encoding: TiktokenEncoding;
}
