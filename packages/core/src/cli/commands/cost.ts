/**
 * Cost Command
 *
 * Estimate the cost of a call from token counts, or of image generation.
 */

import { resolve } from 'node:path';

import type { Command } from 'commander';

import { loadConfig } from '../../config/loader.js';
import { buildGateway } from '../../gateway.js';
import * as output from '../utils/output.js';
import { parseNumber } from '../utils/gateway.js';

interface CostOptions {
  input: number;
  output: number;
  cached: number;
  reasoning: number;
  provider?: string;
  image?: boolean;
  quality?: string;
  size?: string;
  count: number;
  json?: boolean;
  config?: string;
}

export function registerCostCommand(program: Command): void {
  program
    .command('cost <model>')
    .description('Estimate the cost of a call')
    .option('-i, --input <tokens>', 'Input tokens', parseNumber, 0)
    .option('-o, --output <tokens>', 'Output tokens', parseNumber, 0)
    .option('--cached <tokens>', 'Cached input tokens', parseNumber, 0)
    .option('--reasoning <tokens>', 'Reasoning tokens', parseNumber, 0)
    .option('-p, --provider <name>', 'Provider catalog to search first')
    .option('--image', 'Price image generation instead of tokens')
    .option('--quality <quality>', 'Image quality (standard, hd, ...)')
    .option('--size <size>', 'Image size, e.g. 1024x1792')
    .option('--count <n>', 'Number of images', parseNumber, 1)
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (model: string, options: CostOptions) => {
      await costCommand(model, options);
    });
}

async function costCommand(model: string, options: CostOptions): Promise<void> {
  try {
    const config = await loadConfig(options.config ? resolve(options.config) : undefined);
    const { costs } = buildGateway(config);

    if (!costs.hasPricing(model, options.provider)) {
      output.warning(`No pricing for ${model}; cost is 0`);
    }

    if (options.image) {
      const total = costs.imageCost(model, {
        quality: options.quality,
        size: options.size,
        count: options.count,
      });
      if (options.json) {
        output.json({ model, count: options.count, totalCost: total, currency: costs.currency });
        return;
      }
      console.log(`${model} × ${options.count}: ${output.formatCost(total, costs.currency, config.pricing.decimalPlaces)}`);
      return;
    }

    const result = costs.calculate({
      provider: options.provider,
      model,
      usage: {
        inputTokens: options.input,
        outputTokens: options.output,
        cachedInputTokens: options.cached,
        reasoningTokens: options.reasoning,
      },
    });

    if (options.json) {
      output.json({ model, ...result });
      return;
    }

    output.header(`Cost estimate: ${model}`);
    output.table([
      { part: 'input', tokens: options.input, usd: result.inputCost },
      { part: 'output', tokens: options.output, usd: result.outputCost },
      { part: 'cached input', tokens: options.cached, usd: result.cachedInputCost },
      { part: 'reasoning', tokens: options.reasoning, usd: result.reasoningCost },
    ]);
    console.log('');
    console.log(`Total: ${output.color('bold', output.formatCost(result.totalCost, result.currency, config.pricing.decimalPlaces))}`);
  } catch (error) {
    output.exitWithError(error instanceof Error ? error.message : String(error));
  }
}
