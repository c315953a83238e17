/**
 * Cache and rate-limit status commands.
 */

import type { Command } from 'commander';

import * as output from '../utils/output.js';
import { loadGateway, type GatewayCommandOptions } from '../utils/gateway.js';

interface StatsOptions extends GatewayCommandOptions {
  json?: boolean;
  caller?: string;
}

export function registerCacheStatsCommand(program: Command): void {
  program
    .command('cache:stats')
    .description('Show cache settings and counters')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: StatsOptions) => {
      try {
        const gateway = await loadGateway(options);
        const stats = { ...gateway.config.cache, ...gateway.cache.getStats() };

        if (options.json) {
          output.json(stats);
          return;
        }

        output.header('Cache');
        output.table(Object.entries(stats).map(([setting, value]) => ({
          setting,
          value: Array.isArray(value) ? value.join(', ') : String(value),
        })));
      } catch (error) {
        output.exitWithError(error instanceof Error ? error.message : String(error));
      }
    });
}

export function registerLimitsCommand(program: Command): void {
  program
    .command('limits <provider> <model>')
    .description('Show rate-limit usage for a provider and model')
    .option('--caller <id>', 'Caller identity')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (provider: string, model: string, options: StatsOptions) => {
      try {
        const gateway = await loadGateway(options);
        const stats = await gateway.rateLimiter.getStats(provider, model, options.caller);

        if (options.json) {
          output.json(stats);
          return;
        }

        output.header(`Rate limits: ${provider}/${model}`);
        output.table((['requestsPerMinute', 'tokensPerMinute', 'requestsPerDay'] as const).map((dimension) => ({
          dimension,
          current: stats.current[dimension],
          limit: stats.limits[dimension] || 'off',
        })));
        output.dim(`Minute window resets at ${new Date(stats.resetAt).toISOString()}`);
      } catch (error) {
        output.exitWithError(error instanceof Error ? error.message : String(error));
      }
    });
}
