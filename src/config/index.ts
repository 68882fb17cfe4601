/**
 * QueryGate - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  ServerConfigSchema,
  DatabaseConfigSchema,
  PolicyConfigSchema,
  ForbiddenKeywordSchema,
  QueryGateConfigSchema,
  ConfigFileSchema,
  formatValidationErrors,
} from './schema.js';

export type {
  QueryGateConfigInput,
  QueryGateConfigOutput,
  ConfigFileInput,
  ConfigFileOutput,
} from './schema.js';

export { ConfigLoader, loadConfig, createConfig } from './loader.js';

export type { LoadConfigOptions } from './loader.js';
