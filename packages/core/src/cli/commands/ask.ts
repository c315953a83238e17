/**
 * Ask Command
 *
 * Send one prompt through the gateway.
 */

import type { Command } from 'commander';

import type { RequestOptions } from '../../types.js';
import * as output from '../utils/output.js';
import { collectVar, loadGateway, parseNumber } from '../utils/gateway.js';

interface AskOptions {
  provider?: string;
  model?: string;
  preset?: string;
  system?: string;
  template?: string;
  var: Record<string, string>;
  temperature?: number;
  maxTokens?: number;
  caller?: string;
  mock?: boolean;
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask [prompt]')
    .description('Send a prompt to a provider')
    .option('-p, --provider <name>', 'Provider (openai, claude, gemini, grok, mock)')
    .option('-m, --model <name>', 'Model name')
    .option('--preset <name>', 'Preset to start from')
    .option('-s, --system <text>', 'System prompt')
    .option('-t, --template <name>', 'Use a stored prompt template instead of [prompt]')
    .option('--var <key=value>', 'Template variable (repeatable)', collectVar, {})
    .option('--temperature <n>', 'Sampling temperature', parseNumber)
    .option('--max-tokens <n>', 'Maximum output tokens', parseNumber)
    .option('--caller <id>', 'Caller identity for rate limiting')
    .option('--mock', 'Answer with the local mock provider')
    .option('--json', 'Output the normalized response as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (prompt: string | undefined, options: AskOptions) => {
      await askCommand(prompt, options);
    });
}

async function askCommand(prompt: string | undefined, options: AskOptions): Promise<void> {
  if (!prompt && !options.template) {
    output.exitWithError('A prompt is required. Use: promptgate ask "your prompt" or --template <name>');
  }

  try {
    const gateway = await loadGateway(options);
    const builder = gateway.request();

    if (options.template) {
      builder.promptTemplate(options.template, options.var);
    } else if (prompt) {
      builder.prompt(prompt).vars(options.var);
    }
    if (options.preset) builder.preset(options.preset);
    if (options.mock) builder.provider('mock');
    else if (options.provider) builder.provider(options.provider);
    if (options.model) builder.model(options.model);
    if (options.system) builder.systemPrompt(options.system);
    if (options.caller) builder.caller(options.caller);

    const overrides: RequestOptions = {};
    if (options.temperature !== undefined) overrides.temperature = options.temperature;
    if (options.maxTokens !== undefined) overrides.max_tokens = options.maxTokens;
    builder.options(overrides);

    const result = await builder.execute();

    if (options.json) {
      output.json(result.response);
      if (!result.ok) process.exitCode = 1;
      return;
    }

    if (!result.ok) {
      output.exitWithError(`${result.error.name}: ${result.error.message}`);
    }

    const { response } = result;
    console.log('');
    console.log(response.content);
    console.log('');
    output.dim(
      [
        `${String(response.meta['provider'])}/${String(response.meta['model'])}`,
        `tokens ${output.formatTokens(response.usage.totalTokens)} (in ${response.usage.inputTokens}, out ${response.usage.outputTokens})`,
        `cost ${output.formatCost(response.cost, gateway.costs.currency, gateway.config.pricing.decimalPlaces)}`,
        response.cached ? 'cached' : output.formatDuration(response.responseTimeMs),
      ].join(' · ')
    );
  } catch (error) {
    output.exitWithError(error instanceof Error ? error.message : String(error));
  }
}
