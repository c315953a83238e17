/**
 * Config Resolver
 *
 * Merges a request with its preset and the process defaults into one frozen
 * ResolvedConfig. Option precedence: defaults < preset < request.
 */

import {
  DEFAULT_MODEL,
  DEFAULT_OPTIONS,
  DEFAULT_PRESET_NAME,
  DEFAULT_PROVIDER,
} from '../constants.js';
import { ConfigurationError } from '../errors.js';
import type { PresetRepository } from '../presets/preset-repository.js';
import type { RequestOptions, RequestSpec, ResolvedConfig } from '../types.js';
import { renderTemplate } from '../utils/template.js';
import { applyModelFamilies, MODEL_FAMILIES, type ModelFamily } from './model-families.js';

export interface RequestDefaults {
  provider: string;
  model: string;
  options: RequestOptions;
}

export const DEFAULT_REQUEST_DEFAULTS: RequestDefaults = {
  provider: DEFAULT_PROVIDER,
  model: DEFAULT_MODEL,
  options: { ...DEFAULT_OPTIONS },
};

export interface ConfigResolverOptions {
  presets: PresetRepository;
  defaults?: Partial<RequestDefaults>;
  /** Families applied after merging (default: the built-in table) */
  modelFamilies?: readonly ModelFamily[];
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

export class ConfigResolver {
  private readonly presets: PresetRepository;
  private readonly defaults: RequestDefaults;
  private readonly families: readonly ModelFamily[];

  constructor(options: ConfigResolverOptions) {
    this.presets = options.presets;
    this.defaults = { ...DEFAULT_REQUEST_DEFAULTS, ...options.defaults };
    this.families = options.modelFamilies ?? MODEL_FAMILIES;
  }

  /**
   * @throws {PresetNotFoundError} when the preset does not exist
   * @throws {ConfigurationError} when the prompt is empty or no provider or model can be determined
   */
  resolve(spec: RequestSpec): ResolvedConfig {
    const vars = { ...spec.vars };
    const prompt = renderTemplate(spec.prompt, vars);
    if (prompt.trim() === '') {
      throw new ConfigurationError('A prompt is required');
    }

    const preset = this.presets.get(spec.presetName ?? DEFAULT_PRESET_NAME);

    const provider = firstNonEmpty(spec.provider, preset.provider, this.defaults.provider);
    const model = firstNonEmpty(spec.model, preset.model, this.defaults.model);
    if (!provider || !model) {
      throw new ConfigurationError('A provider and a model are required');
    }

    const systemPrompt = spec.systemPrompt ?? preset.systemPrompt;
    const merged: RequestOptions = {
      ...this.defaults.options,
      ...preset.options,
      ...spec.options,
    };

    // Cloned so freezing never reaches objects the caller or the preset store still own
    return deepFreeze(structuredClone({
      provider,
      model,
      prompt,
      systemPrompt: systemPrompt === undefined ? undefined : renderTemplate(systemPrompt, vars),
      options: applyModelFamilies(model, merged, this.families),
      vars,
      stream: spec.stream ?? false,
    }));
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
