/**
 * Presets Module
 */

export type { PresetRepository } from './preset-repository.js';
export {
  BUILTIN_PRESETS,
  InMemoryPresetRepository,
  YamlPresetRepository,
  parsePresetFile,
} from './preset-repository.js';
