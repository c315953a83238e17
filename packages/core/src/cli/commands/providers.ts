/**
 * Providers Command
 *
 * Lists providers and whether each one has credentials.
 */

import type { Command } from 'commander';

import { errorMessage } from '../../errors.js';
import { EnvProviderConfigs } from '../../config/resolver.js';
import * as output from '../utils/output.js';
import { loadGateway, type GatewayCommandOptions } from '../utils/gateway.js';

interface ProvidersOptions extends GatewayCommandOptions {
  json?: boolean;
}

export function registerProvidersCommand(program: Command): void {
  program
    .command('providers')
    .description('List providers and their configuration status')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ProvidersOptions) => {
      await providersCommand(options);
    });
}

async function providersCommand(options: ProvidersOptions): Promise<void> {
  try {
    const gateway = await loadGateway(options);
    const configs = new EnvProviderConfigs(gateway.config.providers);

    const rows = gateway.providers.list().map((name) => {
      const provider = gateway.providers.get(name);
      if (provider.local) {
        return { name, status: 'local', endpoint: '-' };
      }
      try {
        const config = configs.get(name);
        return { name, status: 'ready', endpoint: config.baseUrl ?? provider.defaultBaseUrl };
      } catch (error) {
        return { name, status: errorMessage(error), endpoint: provider.defaultBaseUrl };
      }
    });

    if (options.json) {
      output.json(rows);
      return;
    }

    output.header('Providers');
    output.table(rows.map((row) => ({
      ...row,
      status: row.status === 'ready' || row.status === 'local'
        ? output.color('green', row.status)
        : output.color('yellow', row.status),
    })));
  } catch (error) {
    output.exitWithError(error instanceof Error ? error.message : String(error));
  }
}
