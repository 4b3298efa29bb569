/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
  validateVersion,
  validateDataset,
  validateReport,
  validateLogLevel,
} from './ConfigLoader.js';
export type { LexigramConfig } from './ConfigLoader.js';
