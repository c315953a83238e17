/**
 * Batch Execution
 *
 * Fans a list of requests out over the pipeline with p-limit. Each slot is
 * an independent call; one failed slot never fails the batch.
 */

import pLimit from 'p-limit';

import { DEFAULT_BATCH_CONCURRENCY } from '../constants.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { systemClock, type Clock, type RequestSpec } from '../types.js';
import type { ExecuteOptions, PipelineResult, RequestPipeline } from './request-pipeline.js';

export interface BatchOptions extends ExecuteOptions {
  /** Maximum number of requests in flight (default: 4) */
  concurrency?: number;
  /** Called as each slot finishes; a throwing callback is logged and ignored */
  onResult?: (result: PipelineResult, index: number) => void;
  clock?: Clock;
  logger?: Logger;
}

export interface BatchResult {
  /** One result per input, in input order */
  results: PipelineResult[];
  succeeded: number;
  failed: number;
  totalDurationMs: number;
}

/**
 * Run requests concurrently.
 *
 * @example
 * ```typescript
 * const { results, failed } = await executeBatch(pipeline, [
 *   { prompt: 'Summarize A' },
 *   { prompt: 'Summarize B', provider: 'claude', model: 'claude-3-5-haiku' },
 * ], { concurrency: 2 });
 * ```
 */
export async function executeBatch(
  pipeline: Pick<RequestPipeline, 'execute'>,
  specs: readonly RequestSpec[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const {
    concurrency = DEFAULT_BATCH_CONCURRENCY,
    callerId,
    signal,
    onResult,
    clock = systemClock,
    logger = silentLogger,
  } = options;

  const limit = pLimit(Math.max(1, concurrency));
  const startTime = clock.now();

  const results = await Promise.all(
    specs.map((spec, index) =>
      limit(async () => {
        const result = await pipeline.execute(spec, { callerId, signal });
        if (onResult) {
          try {
            onResult(result, index);
          } catch (error) {
            logger.warn(`Batch result callback failed for slot ${index}: ${errorMessage(error)}`);
          }
        }
        return result;
      })
    )
  );

  const succeeded = results.filter((result) => result.ok).length;
  return {
    results,
    succeeded,
    failed: results.length - succeeded,
    totalDurationMs: clock.now() - startTime,
  };
}
