/**
 * Request Resolution Module
 */

export { ConfigResolver, DEFAULT_REQUEST_DEFAULTS } from './config-resolver.js';
export type { ConfigResolverOptions, RequestDefaults } from './config-resolver.js';
export {
  MODEL_FAMILIES,
  applyModelFamilies,
  findModelFamilies,
} from './model-families.js';
export type { ModelFamily } from './model-families.js';
