/**
 * Request Logger
 *
 * Collaborator that receives one entry per pipeline call, after the outcome
 * is known. Storage and analytics live outside the pipeline; these
 * implementations print or keep entries in memory.
 */

import type { GatewayError } from '../errors.js';
import type { NormalizedResponse, RequestSpec } from '../types.js';
import type { Logger } from './logger.js';

export interface RequestLogEntry {
  spec: RequestSpec;
  response: NormalizedResponse;
  /** Resolved provider, or the requested one when resolution failed */
  provider: string;
  model: string;
  durationMs: number;
  error?: GatewayError;
  /** Epoch milliseconds when the call finished */
  timestamp: number;
}

export interface RequestLogger {
  log(entry: RequestLogEntry): void | Promise<void>;
}

/**
 * Writes one line per call through a Logger.
 */
export class ConsoleRequestLogger implements RequestLogger {
  constructor(private readonly logger: Logger) {}

  log(entry: RequestLogEntry): void {
    const { provider, model, durationMs, response } = entry;
    const context = {
      provider,
      model,
      durationMs,
      cached: response.cached,
      tokens: response.usage.totalTokens,
      cost: response.cost,
    };

    if (entry.error) {
      this.logger.warn(`Request failed: ${entry.error.message}`, { ...context, kind: entry.error.kind });
    } else {
      this.logger.info('Request completed', context);
    }
  }
}

export interface RequestLogSummary {
  total: number;
  errors: number;
  cacheHits: number;
  totalCost: number;
  totalTokens: number;
  averageDurationMs: number;
  byProvider: Record<string, number>;
}

/**
 * Keeps entries in memory and summarizes them.
 */
export class InMemoryRequestLogger implements RequestLogger {
  readonly entries: RequestLogEntry[] = [];

  constructor(private readonly maxEntries = 1000) {}

  log(entry: RequestLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  summary(): RequestLogSummary {
    const byProvider: Record<string, number> = {};
    let errors = 0;
    let cacheHits = 0;
    let totalCost = 0;
    let totalTokens = 0;
    let totalDuration = 0;

    for (const entry of this.entries) {
      byProvider[entry.provider] = (byProvider[entry.provider] ?? 0) + 1;
      if (entry.error) errors++;
      if (entry.response.cached) cacheHits++;
      totalCost += entry.response.cost;
      totalTokens += entry.response.usage.totalTokens;
      totalDuration += entry.durationMs;
    }

    return {
      total: this.entries.length,
      errors,
      cacheHits,
      totalCost,
      totalTokens,
      averageDurationMs: this.entries.length === 0 ? 0 : totalDuration / this.entries.length,
      byProvider,
    };
  }

  clear(): void {
    this.entries.length = 0;
  }
}
