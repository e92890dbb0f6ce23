export {
  loadConfig,
  mergeConfigs,
  validateConfig,
  type ConfigLoadResult,
  type ConfigLoadOptions,
} from './config-manager.js';
export { ConfigSchema, type ValidatedConfig } from './schema.js';
export { resolveSettings, type ReviewSettings, type ReviewerKind } from './settings.js';
