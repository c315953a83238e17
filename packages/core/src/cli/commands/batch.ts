/**
 * Batch Command
 *
 * Run a YAML list of requests concurrently.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from '../../errors.js';
import type { RequestSpec } from '../../types.js';
import * as output from '../utils/output.js';
import { loadGateway, parseNumber } from '../utils/gateway.js';

interface BatchCommandOptions {
  concurrency?: number;
  caller?: string;
  mock?: boolean;
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

const batchEntrySchema = z.object({
  prompt: z.string().min(1),
  system: z.string().optional(),
  provider: z.string().optional(),
  model: z.string().optional(),
  preset: z.string().optional(),
  options: z.record(z.unknown()).optional(),
  vars: z.record(z.string()).optional(),
}).strict();

const batchEntriesSchema = z.array(batchEntrySchema);

const wrappedBatchSchema = z.object({ requests: batchEntriesSchema }).transform((file) => file.requests);

/**
 * Parse a batch file: a YAML list of requests, or `{ requests: [...] }`.
 *
 * @example
 * ```yaml
 * - prompt: Summarize {{topic}}
 *   vars: { topic: caching }
 * - prompt: Translate "hello" to French
 *   provider: claude
 *   model: claude-3-5-haiku
 * ```
 */
export function parseBatchFile(content: string, file: string): RequestSpec[] {
  const raw: unknown = parseYaml(content);
  const parsed = Array.isArray(raw) ? batchEntriesSchema.safeParse(raw) : wrappedBatchSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid batch file';
    throw new ConfigurationError(`Invalid batch file ${file} (${where})`);
  }

  return parsed.data.map((entry) => ({
    prompt: entry.prompt,
    systemPrompt: entry.system,
    provider: entry.provider,
    model: entry.model,
    presetName: entry.preset,
    options: entry.options,
    vars: entry.vars,
  }));
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch <file>')
    .description('Run every request in a YAML file')
    .option('--concurrency <n>', 'Requests in flight at once', parseNumber)
    .option('--caller <id>', 'Caller identity for rate limiting')
    .option('--mock', 'Answer every request with the local mock provider')
    .option('--json', 'Output results as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (file: string, options: BatchCommandOptions) => {
      await batchCommand(file, options);
    });
}

async function batchCommand(file: string, options: BatchCommandOptions): Promise<void> {
  try {
    const path = resolve(file);
    let specs = parseBatchFile(readFileSync(path, 'utf-8'), path);
    if (options.mock) {
      specs = specs.map((spec) => ({ ...spec, provider: 'mock' }));
    }

    const gateway = await loadGateway(options);
    const batch = await gateway.batch(specs, {
      concurrency: options.concurrency,
      callerId: options.caller,
    });

    if (options.json) {
      output.json(batch);
    } else {
      output.header(`Batch: ${specs.length} requests`);
      output.table(batch.results.map((result, index) => ({
        '#': index + 1,
        status: result.ok ? 'ok' : 'failed',
        cached: result.response.cached,
        tokens: result.response.usage.totalTokens,
        cost: result.response.cost,
        output: output.truncate((result.ok ? result.response.content : result.error.message).replace(/\s+/g, ' '), 60),
      })));
      console.log('');
      const summary = `${batch.succeeded} succeeded, ${batch.failed} failed in ${output.formatDuration(batch.totalDurationMs)}`;
      if (batch.failed === 0) output.success(summary);
      else output.warning(summary);
    }

    if (batch.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    output.exitWithError(error instanceof Error ? error.message : String(error));
  }
}
