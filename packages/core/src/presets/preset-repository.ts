/**
 * Preset Repository
 *
 * Named presets (provider, model, system prompt, options). Built-in presets
 * are always available; a directory of YAML files can add or override them.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DEFAULT_MODEL, DEFAULT_PROVIDER } from '../constants.js';
import { PresetNotFoundError, PresetParseError } from '../errors.js';
import type { Preset } from '../types.js';

export interface PresetRepository {
  /** @throws {PresetNotFoundError} */
  get(name: string): Preset;
  exists(name: string): boolean;
  list(): string[];
}

/**
 * Presets shipped with the gateway.
 */
export const BUILTIN_PRESETS: readonly Preset[] = [
  {
    name: 'default',
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    systemPrompt: 'You are a helpful assistant.',
    options: { temperature: 0.7 },
  },
  {
    name: 'ask',
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    systemPrompt: 'Answer the question accurately and concisely.',
    options: { temperature: 0.3, max_tokens: 1000 },
  },
  {
    name: 'create',
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    systemPrompt: 'You are a creative writer. Produce original, engaging content.',
    options: { temperature: 0.9, max_tokens: 4000 },
  },
];

/**
 * Presets held in memory.
 */
export class InMemoryPresetRepository implements PresetRepository {
  private readonly presets = new Map<string, Preset>();

  constructor(presets: readonly Preset[] = BUILTIN_PRESETS) {
    for (const preset of presets) {
      this.add(preset);
    }
  }

  add(preset: Preset): void {
    this.presets.set(preset.name, preset);
  }

  get(name: string): Preset {
    const preset = this.presets.get(name);
    if (!preset) {
      throw new PresetNotFoundError(name);
    }
    return preset;
  }

  exists(name: string): boolean {
    return this.presets.has(name);
  }

  list(): string[] {
    return Array.from(this.presets.keys()).sort();
  }
}

/**
 * Shape of a preset file.
 */
const presetFileSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  system_prompt: z.string().optional(),
  options: z.record(z.unknown()).default({}),
});

const PRESET_EXTENSIONS = ['.yaml', '.yml'];

/**
 * Parse the contents of a preset file.
 *
 * @throws {PresetParseError} on invalid YAML or a missing field
 */
export function parsePresetFile(name: string, content: string, file: string): Preset {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new PresetParseError(
      `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      file,
      { cause: error }
    );
  }

  const result = presetFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PresetParseError(`Invalid preset (${issues})`, file);
  }

  return {
    name,
    provider: result.data.provider,
    model: result.data.model,
    systemPrompt: result.data.system_prompt,
    options: result.data.options,
  };
}

/**
 * Presets read from `<dir>/<name>.yaml` files, falling back to built-ins.
 *
 * @example
 * ```yaml
 * # presets/summarize.yaml
 * provider: claude
 * model: claude-3-5-haiku-latest
 * system_prompt: Summarize the text in three sentences.
 * options:
 *   temperature: 0.2
 * ```
 */
export class YamlPresetRepository implements PresetRepository {
  private readonly fallback: InMemoryPresetRepository;
  private readonly loaded = new Map<string, Preset>();

  constructor(
    private readonly dir: string,
    builtins: readonly Preset[] = BUILTIN_PRESETS
  ) {
    this.fallback = new InMemoryPresetRepository(builtins);
  }

  get(name: string): Preset {
    const cached = this.loaded.get(name);
    if (cached) {
      return cached;
    }

    const file = this.findFile(name);
    if (file) {
      const preset = parsePresetFile(name, readFileSync(file, 'utf-8'), file);
      this.loaded.set(name, preset);
      return preset;
    }

    return this.fallback.get(name);
  }

  exists(name: string): boolean {
    return this.findFile(name) !== null || this.fallback.exists(name);
  }

  list(): string[] {
    const names = new Set(this.fallback.list());
    if (existsSync(this.dir)) {
      for (const entry of readdirSync(this.dir)) {
        const ext = extname(entry);
        if (PRESET_EXTENSIONS.includes(ext)) {
          names.add(basename(entry, ext));
        }
      }
    }
    return Array.from(names).sort();
  }

  /**
   * Drop parsed presets so edited files are read again.
   */
  refresh(): void {
    this.loaded.clear();
  }

  private findFile(name: string): string | null {
    // Names map straight to file names; refuse anything path-like
    if (!/^[\w.-]+$/.test(name)) {
      return null;
    }
    for (const ext of PRESET_EXTENSIONS) {
      const file = join(this.dir, `${name}${ext}`);
      if (existsSync(file)) {
        return file;
      }
    }
    return null;
  }
}
