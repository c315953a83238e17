/**
 * Retry Controller
 *
 * Runs an operation up to `maxAttempts` times with exponential backoff
 * between attempts. Only errors whose kind is listed as retryable are tried
 * again; anything else propagates on the first failure.
 */

import {
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_MULTIPLIER,
  DEFAULT_RETRYABLE_KINDS,
} from '../constants.js';
import {
  ProviderRequestError,
  RetriesExhaustedError,
  toGatewayError,
  type ErrorKind,
  type GatewayError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay before the second attempt */
  initialDelayMs: number;
  multiplier: number;
  /** Draw each delay uniformly from [0, delay] */
  jitter: boolean;
  retryableKinds: readonly ErrorKind[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: DEFAULT_RETRY_MAX_ATTEMPTS,
  initialDelayMs: DEFAULT_RETRY_DELAY_MS,
  multiplier: DEFAULT_RETRY_MULTIPLIER,
  jitter: false,
  retryableKinds: DEFAULT_RETRYABLE_KINDS,
};

export interface RetryInfo {
  /** Attempt that just failed, starting at 1 */
  attempt: number;
  delayMs: number;
  error: GatewayError;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryControllerOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: SleepFn;
  /** Source for jitter, returning values in [0, 1) */
  random?: () => number;
  logger?: Logger;
}

export class RetryController {
  readonly policy: RetryPolicy;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: RetryControllerOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  isRetryable(error: GatewayError): boolean {
    return this.policy.retryableKinds.includes(error.kind);
  }

  /**
   * Backoff before the attempt after `attempt`, honoring a Retry-After hint.
   */
  delayFor(attempt: number, error?: GatewayError): number {
    let delay = this.policy.initialDelayMs * this.policy.multiplier ** (attempt - 1);
    if (this.policy.jitter) {
      delay = Math.floor(this.random() * delay);
    }
    if (error instanceof ProviderRequestError && error.retryAfterMs !== undefined) {
      delay = Math.max(delay, error.retryAfterMs);
    }
    return delay;
  }

  /**
   * @throws the operation's error unchanged when it is not retryable
   * @throws {RetriesExhaustedError} when every attempt failed with a retryable error
   * @throws {RequestCancelledError} when `signal` aborts during a backoff
   */
  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const failure = toGatewayError(error);
        if (!this.isRetryable(failure)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          this.logger.warn(`Giving up after ${attempt} attempts`, { kind: failure.kind, error: failure.message });
          throw new RetriesExhaustedError(attempt, failure);
        }

        const delayMs = this.delayFor(attempt, failure);
        this.logger.debug(`Attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
          kind: failure.kind,
          error: failure.message,
        });
        options.onRetry?.({ attempt, delayMs, error: failure });
        await this.sleep(delayMs, options.signal);
      }
    }
  }
}
