/**
 * Config Loader
 *
 * Discovers and loads promptgate.config.* files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, isAbsolute, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { parse as parseYaml } from 'yaml';

import { ConfigurationError, errorMessage } from '../errors.js';
import { resolveConfig, validateConfig } from './resolver.js';
import type { GatewayConfig, ResolvedGatewayConfig } from './types.js';

/**
 * Config file names to search for (in order of priority).
 */
const CONFIG_FILE_NAMES = [
  'promptgate.config.ts',
  'promptgate.config.js',
  'promptgate.config.mjs',
  'promptgate.config.yaml',
  'promptgate.config.yml',
];

/**
 * Find the config file by searching from cwd up to root.
 */
export function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir ?? process.cwd();

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

function defaultExport(module: unknown): unknown {
  if (typeof module === 'object' && module !== null && 'default' in module) {
    return module.default;
  }
  return undefined;
}

/**
 * Load a config file and return the validated raw config.
 *
 * @throws {ConfigurationError} when the file is missing, unreadable or invalid
 */
export async function loadConfigFile(configPath: string): Promise<GatewayConfig> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    const extension = extname(absolutePath);
    if (extension === '.yaml' || extension === '.yml') {
      raw = parseYaml(readFileSync(absolutePath, 'utf-8')) ?? {};
    } else {
      // Use dynamic import with file URL for ESM compatibility
      const module: unknown = await import(pathToFileURL(absolutePath).href);
      raw = defaultExport(module);
    }
  } catch (error) {
    throw new ConfigurationError(`Failed to load config file ${absolutePath}: ${errorMessage(error)}`, { cause: error });
  }

  if (raw === undefined) {
    throw new ConfigurationError(`Config file must have a default export: ${absolutePath}`);
  }

  return validateConfig(raw);
}

/**
 * Result of loading config with both raw and resolved versions.
 */
export interface LoadConfigResult {
  resolved: ResolvedGatewayConfig;
  raw: GatewayConfig;
  /** Loaded file, or null when defaults were used */
  path: string | null;
}

function relativeTo(baseDir: string, path: string | undefined): string | undefined {
  if (path === undefined || isAbsolute(path)) {
    return path;
  }
  return resolve(baseDir, path);
}

/**
 * Load config and return both raw and resolved versions.
 *
 * Without a path, searches from cwd; when nothing is found the defaults
 * apply. Directory and file settings are taken relative to the config file.
 */
export async function loadConfigWithRaw(configPath?: string): Promise<LoadConfigResult> {
  const path = configPath ?? findConfigFile();
  if (!path) {
    return { resolved: resolveConfig({}), raw: {}, path: null };
  }

  const raw = await loadConfigFile(path);
  const resolved = resolveConfig(raw);
  const baseDir = dirname(resolve(path));

  return {
    resolved: {
      ...resolved,
      presetsDir: relativeTo(baseDir, resolved.presetsDir),
      promptsDir: relativeTo(baseDir, resolved.promptsDir),
      rateLimits: {
        ...resolved.rateLimits,
        file: relativeTo(baseDir, resolved.rateLimits.file) ?? resolved.rateLimits.file,
      },
    },
    raw,
    path,
  };
}

/**
 * Load and resolve the config.
 *
 * @param configPath - Optional path to config file. If not provided, searches from cwd.
 */
export async function loadConfig(configPath?: string): Promise<ResolvedGatewayConfig> {
  const result = await loadConfigWithRaw(configPath);
  return result.resolved;
}

/**
 * Check if a config file exists in the current directory tree.
 */
export function hasConfigFile(startDir?: string): boolean {
  return findConfigFile(startDir) !== null;
}
