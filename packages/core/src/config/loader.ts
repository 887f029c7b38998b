/**
 * Configuration Loader for deepread
 *
 * - Config files are validated against strict schemas
 * - Environment variables carry secrets (never stored in config)
 * - Defaults come from the schema
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from '@deepread/shared';
import { ConfigurationError, toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
export const DEFAULT_CONFIG_PATHS = [
  './deepread.yaml',
  './deepread.yml',
  './config/deepread.yaml',
  '~/.deepread/config.yaml',
];

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

/**
 * Load configuration from a YAML file. Returns null when the file does not exist.
 */
function loadConfigFile(path: string): ConfigTree | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`
    );
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = PartialConfigSchema.safeParse(parsed);
  if (!result.success || !isTree(parsed)) {
    const detail = result.success ? 'expected a mapping' : result.error.message;
    throw new ConfigurationError(`Invalid configuration in ${expandedPath}: ${detail}`);
  }

  return parsed;
}

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return isNaN(value) ? undefined : value;
}

function setIfDefined(tree: ConfigTree, section: string, key: string, value: unknown): void {
  if (value === undefined || value === '') return;
  const existing = tree[section];
  const target: ConfigTree = isTree(existing) ? existing : {};
  target[key] = value;
  tree[section] = target;
}

/**
 * Load configuration from environment variables.
 * Only non-secret values; secrets are read by name through getSecret.
 */
export function loadEnvConfig(): ConfigTree {
  const config: ConfigTree = {};

  setIfDefined(config, 'logging', 'level', process.env.DEEPREAD_LOG_LEVEL);
  setIfDefined(config, 'model', 'model', process.env.DEEPREAD_MODEL);
  setIfDefined(config, 'model', 'baseUrl', process.env.DEEPREAD_BASE_URL);
  setIfDefined(config, 'agent', 'maxTurns', parseIntEnv('DEEPREAD_MAX_TURNS'));
  setIfDefined(config, 'sandbox', 'backend', process.env.DEEPREAD_SANDBOX_BACKEND);
  setIfDefined(config, 'server', 'port', parseIntEnv('DEEPREAD_PORT'));

  const sandboxUrl = process.env.DEEPREAD_SANDBOX_URL;
  if (sandboxUrl) {
    const sandbox = isTree(config.sandbox) ? config.sandbox : {};
    sandbox.remote = { url: sandboxUrl };
    config.sandbox = sandbox;
  }

  return config;
}

/**
 * Deep merge two config trees.
 * Later values override earlier ones; arrays are replaced, not merged.
 */
export function mergeConfigs(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] = isTree(value) && isTree(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Candidate files for auto-discovery */
  searchPaths?: string[];
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: ConfigTree = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new ConfigurationError(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else {
    for (const path of options.searchPaths ?? DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  let mergedConfig = options.skipEnv ? fileConfig : mergeConfigs(fileConfig, loadEnvConfig());

  if (options.overrides) {
    mergedConfig = mergeConfigs(mergedConfig, options.overrides);
  }

  const result = ConfigSchema.safeParse(mergedConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

/**
 * Get a secret value from environment variable
 * This is the only way to access secrets - they are never stored in config objects
 */
export function getSecret(envVarName: string): string | undefined {
  return process.env[envVarName] || undefined;
}

/**
 * Get a required secret value from environment variable
 * Throws if the secret is not set
 */
export function requireSecret(envVarName: string): string {
  const value = getSecret(envVarName);
  if (!value) {
    throw new ConfigurationError(`Required secret not set: ${envVarName}`);
  }
  return value;
}

/**
 * Validate that required secrets are set.
 * Call this during startup to fail before any work begins.
 */
export function validateSecrets(config: Config): void {
  const requiredSecrets = [config.model.apiKeyEnv];

  const missing = requiredSecrets.filter((name) => !getSecret(name));

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required secrets:\n  ${missing.join('\n  ')}`);
  }
}
