/**
 * Error taxonomy for the request pipeline.
 *
 * Every failure that leaves the pipeline is a GatewayError with a `kind`,
 * which the retry controller uses to decide whether to try again.
 */

import type { RateLimitDecision } from './rate-limit/types.js';

/**
 * Failure categories.
 */
export type ErrorKind =
  | 'configuration'
  | 'rate_limit'
  | 'timeout'
  | 'connection'
  | 'server'
  | 'client'
  | 'malformed'
  | 'exhausted'
  | 'cancelled'
  | 'unknown';

/**
 * Base class for pipeline errors.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Missing or invalid configuration. Never retried.
 */
export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'configuration', options);
    this.name = 'ConfigurationError';
  }
}

export class PresetNotFoundError extends ConfigurationError {
  constructor(public readonly presetName: string) {
    super(`Preset '${presetName}' not found`);
    this.name = 'PresetNotFoundError';
  }
}

export class PresetParseError extends ConfigurationError {
  constructor(message: string, public readonly file: string, options?: { cause?: unknown }) {
    super(`${message} in ${file}`, options);
    this.name = 'PresetParseError';
  }
}

export class PromptNotFoundError extends ConfigurationError {
  constructor(public readonly promptName: string) {
    super(`Prompt '${promptName}' not found`);
    this.name = 'PromptNotFoundError';
  }
}

export class PromptParseError extends ConfigurationError {
  constructor(message: string, public readonly file: string, options?: { cause?: unknown }) {
    super(`${message} in ${file}`, options);
    this.name = 'PromptParseError';
  }
}

export class ProviderConfigMissingError extends ConfigurationError {
  constructor(public readonly provider: string, detail?: string) {
    super(`Provider '${provider}' is not configured${detail ? `: ${detail}` : ''}`);
    this.name = 'ProviderConfigMissingError';
  }
}

export class UnknownProviderError extends ConfigurationError {
  constructor(public readonly provider: string, available: string[]) {
    super(`Unknown provider '${provider}'. Available: ${available.join(', ')}`);
    this.name = 'UnknownProviderError';
  }
}

// =============================================================================
// Admission
// =============================================================================

/**
 * Raised by the pipeline when the rate limiter denies a request.
 */
export class RateLimitExceededError extends GatewayError {
  constructor(public readonly decision: RateLimitDecision) {
    super(
      `Rate limit exceeded (${decision.deniedBy ?? 'unknown'}); resets at ${new Date(decision.resetAt).toISOString()}`,
      'rate_limit'
    );
    this.name = 'RateLimitExceededError';
  }
}

// =============================================================================
// Upstream
// =============================================================================

/**
 * Non-success HTTP status or unreadable body from a provider.
 */
export class ProviderRequestError extends GatewayError {
  readonly provider: string;
  /** Raw response body, kept for diagnostics */
  readonly body: string;
  readonly status?: number;
  /** Parsed Retry-After header */
  readonly retryAfterMs?: number;

  constructor(message: string, details: ProviderRequestErrorDetails) {
    super(
      message,
      details.kind ?? (details.status === undefined ? 'malformed' : kindForStatus(details.status)),
      { cause: details.cause }
    );
    this.name = 'ProviderRequestError';
    this.provider = details.provider;
    this.body = details.body;
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export interface ProviderRequestErrorDetails {
  provider: string;
  body: string;
  status?: number;
  retryAfterMs?: number;
  kind?: ErrorKind;
  cause?: unknown;
}

export class RequestTimeoutError extends GatewayError {
  constructor(public readonly provider: string, public readonly timeoutMs: number) {
    super(`Request to ${provider} timed out after ${timeoutMs}ms`, 'timeout');
    this.name = 'RequestTimeoutError';
  }
}

export class ConnectionError extends GatewayError {
  constructor(public readonly provider: string, cause: unknown) {
    super(`Could not reach ${provider}: ${errorMessage(cause)}`, 'connection', { cause });
    this.name = 'ConnectionError';
  }
}

export class RequestCancelledError extends GatewayError {
  constructor(message = 'Request was cancelled') {
    super(message, 'cancelled');
    this.name = 'RequestCancelledError';
  }
}

/**
 * Terminal failure after every allowed attempt failed with a retryable error.
 */
export class RetriesExhaustedError extends GatewayError {
  constructor(public readonly attempts: number, public readonly lastError: GatewayError) {
    super(
      `Maximum retry attempts exceeded after ${attempts} attempts: ${lastError.message}`,
      'exhausted',
      { cause: lastError }
    );
    this.name = 'RetriesExhaustedError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map an HTTP status to an error kind.
 */
export function kindForStatus(status: number): ErrorKind {
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server';
  if (status >= 400) return 'client';
  return 'malformed';
}

/**
 * Get the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap any thrown value in a GatewayError, keeping GatewayErrors as they are.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new GatewayError(errorMessage(error), 'unknown', { cause: error });
}

/**
 * Classify any thrown value.
 */
export function classifyError(error: unknown): ErrorKind {
  return toGatewayError(error).kind;
}
