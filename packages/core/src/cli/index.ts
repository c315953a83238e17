/**
 * CLI Module
 *
 * Command-line interface for promptgate.
 */

import { Command } from 'commander';

import {
  registerAskCommand,
  registerBatchCommand,
  registerCacheStatsCommand,
  registerCostCommand,
  registerLimitsCommand,
  registerPresetsCommand,
  registerProvidersCommand,
} from './commands/index.js';

export * from './commands/index.js';
export * as output from './utils/output.js';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
  const program = new Command();

  program
    .name('promptgate')
    .description('Send prompts to LLM providers through one cached, rate-limited pipeline')
    .version('0.1.0');

  registerAskCommand(program);
  registerBatchCommand(program);
  registerCostCommand(program);
  registerPresetsCommand(program);
  registerProvidersCommand(program);
  registerCacheStatsCommand(program);
  registerLimitsCommand(program);

  return program;
}

/**
 * Run the CLI.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
