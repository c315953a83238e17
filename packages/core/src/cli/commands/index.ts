/**
 * CLI Commands
 */

export { registerAskCommand } from './ask.js';
export { registerBatchCommand, parseBatchFile } from './batch.js';
export { registerCostCommand } from './cost.js';
export { registerPresetsCommand } from './presets.js';
export { registerProvidersCommand } from './providers.js';
export { registerCacheStatsCommand, registerLimitsCommand } from './cache-stats.js';
