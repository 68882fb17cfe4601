/**
 * QueryGate - Configuration Loader
 * Layers defaults, an optional YAML/JSON file and environment variables into
 * one validated, frozen configuration object
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import { logConfig } from '../utils/logger.js';
import { deepFreeze, errorMessage, splitList } from '../utils/helpers.js';
import { ConfigurationError, type QueryGateConfig } from '../utils/types.js';

import {
  ConfigFileSchema,
  QueryGateConfigSchema,
  formatValidationErrors,
  type ConfigFileOutput,
  type QueryGateConfigInput,
} from './schema.js';

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value.length === 0 ? undefined : value;
}

// Malformed numbers come back as NaN so validation reports them instead of
// silently falling back to a default
function getEnvInt(env: Env, key: string): number | undefined {
  const value = getEnvString(env, key);
  if (value === undefined) {
    return undefined;
  }
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : NaN;
}

function getEnvBool(env: Env, key: string): boolean | string | undefined {
  const value = getEnvString(env, key);
  if (value === undefined) {
    return undefined;
  }
  const lowered = value.toLowerCase();
  if (lowered === 'true' || lowered === '1') {
    return true;
  }
  if (lowered === 'false' || lowered === '0') {
    return false;
  }
  return value;
}

function getEnvList(env: Env, key: string): string[] | undefined {
  const value = getEnvString(env, key);
  return value === undefined ? undefined : splitList(value);
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export interface LoadConfigOptions {
  env?: Env;
  configPath?: string;
}

export class ConfigLoader {
  private readonly env: Env;
  private readonly configPath: string | undefined;

  constructor(options: LoadConfigOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath ?? getEnvString(this.env, 'QUERYGATE_CONFIG');
  }

  /**
   * Load configuration from file and environment variables
   */
  public load(): QueryGateConfig {
    const fileConfig = this.configPath === undefined ? {} : this.readConfigFile(this.configPath);
    const config = buildConfig(this.overlayEnvironment(fileConfig));

    logConfig('Configuration loaded', {
      configFile: this.configPath ?? null,
      rowLimitCeiling: config.policy.rowLimitCeiling,
      whitelistedTables: config.policy.schemaWhitelist.length,
      forbiddenKeywords: config.policy.forbiddenKeywords.length,
      queryTimeoutMs: config.policy.queryTimeoutMs,
      databaseConfigured: config.database.connectionString !== undefined,
      readOnly: config.database.readOnly,
    });

    return config;
  }

  /**
   * Read and validate a YAML or JSON config file. A file that was asked for
   * but cannot be used is a startup error.
   */
  private readConfigFile(configPath: string): ConfigFileOutput {
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }

    const extension = path.extname(configPath).toLowerCase();
    let raw: unknown;

    try {
      const fileContent = fs.readFileSync(configPath, 'utf-8');
      if (extension === '.yaml' || extension === '.yml') {
        raw = parseYaml(fileContent);
      } else if (extension === '.json') {
        raw = JSON.parse(fileContent);
      } else {
        throw new Error(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      throw new ConfigurationError(`Failed to read config file ${configPath}: ${errorMessage(error)}`);
    }

    // An empty YAML document parses to null
    const result = ConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config file ${configPath}: ${formatValidationErrors(result.error).join('; ')}`
      );
    }

    logConfig('Configuration file loaded', { path: configPath });
    return result.data;
  }

  /**
   * Environment variables win over file values; unset ones fall through
   */
  private overlayEnvironment(fileConfig: ConfigFileOutput): unknown {
    const env = this.env;

    return {
      server: {
        port: getEnvInt(env, 'PORT') ?? fileConfig.server?.port,
        host: getEnvString(env, 'HOST') ?? fileConfig.server?.host,
        nodeEnv: getEnvString(env, 'NODE_ENV') ?? fileConfig.server?.nodeEnv,
      },

      database: {
        connectionString:
          getEnvString(env, 'DB_CONNECTION_STRING') ?? fileConfig.database?.connectionString,
        readOnly: getEnvBool(env, 'DB_READ_ONLY') ?? fileConfig.database?.readOnly,
        poolMax: getEnvInt(env, 'DB_POOL_MAX') ?? fileConfig.database?.poolMax,
        connectionTimeoutMs:
          getEnvInt(env, 'DB_CONNECTION_TIMEOUT_MS') ?? fileConfig.database?.connectionTimeoutMs,
      },

      policy: {
        rowLimitCeiling: getEnvInt(env, 'ROW_LIMIT_CEILING') ?? fileConfig.policy?.rowLimitCeiling,
        schemaWhitelist: getEnvList(env, 'SCHEMA_WHITELIST') ?? fileConfig.policy?.schemaWhitelist,
        forbiddenKeywords:
          getEnvList(env, 'FORBIDDEN_KEYWORDS') ?? fileConfig.policy?.forbiddenKeywords,
        maxQueryLength: getEnvInt(env, 'MAX_QUERY_LENGTH') ?? fileConfig.policy?.maxQueryLength,
        queryTimeoutMs: getEnvInt(env, 'QUERY_TIMEOUT_MS') ?? fileConfig.policy?.queryTimeoutMs,
      },
    };
  }
}

// =============================================================================
// Builders
// =============================================================================

function buildConfig(input: unknown): QueryGateConfig {
  const result = QueryGateConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatValidationErrors(result.error).join('; ')}`
    );
  }
  return deepFreeze(result.data);
}

/**
 * Build a validated, frozen configuration from explicit values. Anything not
 * given takes its default.
 */
export function createConfig(input: QueryGateConfigInput = {}): QueryGateConfig {
  return buildConfig(input);
}

/**
 * Load the service configuration from QUERYGATE_CONFIG and the environment
 */
export function loadConfig(options: LoadConfigOptions = {}): QueryGateConfig {
  return new ConfigLoader(options).load();
}
