export {
  loadConfig,
  validateConfig,
  validatePatterns,
  mergeConfig,
  DEFAULT_CONFIG,
  DEFAULT_ORGANIZE,
  CONFIG_FILE_YAML,
  CONFIG_FILE_JSON,
} from './ConfigLoader.js';
export type { DeclsortConfig, PartialDeclsortConfig } from './ConfigLoader.js';
