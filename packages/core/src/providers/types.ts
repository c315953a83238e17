/**
 * Provider Types
 */

import type {
  ProviderConfig,
  RequestOptions,
  ResolvedConfig,
  Usage,
} from '../types.js';

/**
 * HTTP call a provider wants made.
 */
export interface WireRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/**
 * Provider reply mapped to the normalized shape.
 */
export interface ProviderReply {
  content: string;
  usage: Usage;
  meta: Record<string, unknown>;
}

/**
 * One upstream API dialect.
 */
export interface Provider {
  readonly name: string;
  readonly defaultBaseUrl: string;
  /** Local providers answer without HTTP and need no credentials */
  readonly local?: boolean;

  buildRequest(config: ResolvedConfig, providerConfig: ProviderConfig): WireRequest;

  /**
   * Map a decoded response body.
   *
   * @throws {ProviderRequestError} with kind `malformed` when the body has no content
   */
  parseResponse(body: unknown): ProviderReply;

  /** Translate provider-neutral options into this provider's names */
  transformOptions(options: Readonly<RequestOptions>): RequestOptions;

  /** Produce a response body without HTTP; only for local providers */
  respond?(config: ResolvedConfig): Promise<unknown>;
}
