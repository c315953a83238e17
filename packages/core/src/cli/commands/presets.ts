/**
 * Presets Command
 */

import type { Command } from 'commander';

import * as output from '../utils/output.js';
import { loadGateway, type GatewayCommandOptions } from '../utils/gateway.js';

interface PresetsOptions extends GatewayCommandOptions {
  json?: boolean;
}

export function registerPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List available presets')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: PresetsOptions) => {
      await presetsCommand(options);
    });
}

async function presetsCommand(options: PresetsOptions): Promise<void> {
  try {
    const { presets } = await loadGateway(options);
    const all = presets.list().map((name) => presets.get(name));

    if (options.json) {
      output.json(all);
      return;
    }

    output.header('Presets');
    output.table(all.map((preset) => ({
      name: preset.name,
      provider: preset.provider,
      model: preset.model,
      options: JSON.stringify(preset.options),
      system: output.truncate(preset.systemPrompt ?? '', 40),
    })));
  } catch (error) {
    output.exitWithError(error instanceof Error ? error.message : String(error));
  }
}
