#!/usr/bin/env node
/**
 * promptgate CLI
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { config } from 'dotenv';

import { runCli } from '../src/cli/index.js';
import { findConfigFile } from '../src/config/loader.js';
import { errorMessage } from '../src/errors.js';

/**
 * Env file names to search for (in order of priority).
 */
const ENV_FILE_NAMES = ['.env', '.env.local'];

/**
 * Search up the directory tree for an env file.
 */
function findEnvFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    for (const fileName of ENV_FILE_NAMES) {
      const envPath = join(currentDir, fileName);
      if (existsSync(envPath)) {
        return envPath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load the first env file found beside the config file, then above cwd.
 */
function loadEnvFile(): void {
  const configPath = findConfigFile();
  const path = (configPath ? findEnvFile(dirname(configPath)) : null) ?? findEnvFile(process.cwd());
  if (path) {
    config({ path });
  }
}

loadEnvFile();
runCli().catch((error: unknown) => {
  console.error(`[promptgate] ${errorMessage(error)}`);
  process.exit(1);
});
