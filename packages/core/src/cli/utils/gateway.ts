/**
 * Gateway construction shared by commands.
 */

import { resolve } from 'node:path';

import { InvalidArgumentError } from 'commander';

import { loadConfigWithRaw } from '../../config/loader.js';
import { buildGateway, type Gateway } from '../../gateway.js';
import { createConsoleLogger } from '../../logging/logger.js';
import { ConsoleRequestLogger } from '../../logging/request-logger.js';

export interface GatewayCommandOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load config (from `--config` or the nearest promptgate.config.*) and build a gateway.
 */
export async function loadGateway(options: GatewayCommandOptions): Promise<Gateway> {
  const configPath = options.config ? resolve(options.config) : undefined;
  const { resolved } = await loadConfigWithRaw(configPath);
  const verbose = options.verbose ?? resolved.verbose;
  const logger = createConsoleLogger({ verbose, prefix: 'promptgate' });

  return buildGateway(resolved, {
    logger,
    requestLogger: verbose ? new ConsoleRequestLogger(logger.child('Request')) : undefined,
  });
}

/**
 * Commander collector for repeated `--var key=value` flags.
 */
export function collectVar(value: string, previous: Record<string, string>): Record<string, string> {
  const index = value.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Invalid --var "${value}", expected key=value`);
  }
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

/**
 * Commander parser for numeric options.
 */
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}
