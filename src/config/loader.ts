/**
 * Configuration loader
 *
 * Loads configuration from a YAML file, environment variables and explicit
 * overrides, merging them in order of precedence.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as YAML from 'js-yaml';
import type { ZodError } from 'zod';
import { partialConfigSchema, type PartialValidatorConfig, type ValidatorConfig } from './types';
import { getDefaultConfig } from './defaults';
import { ConfigError, getErrorMessage } from '../utils/error-utils';
import { logger } from '../utils/logger';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['nodeflow-validator.config.yaml', 'nodeflow-validator.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'NFV_';

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export function loadConfig(overrides?: PartialValidatorConfig, configPath?: string): ValidatorConfig {
  let config = getDefaultConfig();

  const fileConfig = loadConfigFile(configPath);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig());

  if (overrides) {
    config = mergeConfig(config, validatePartialConfig(overrides, 'overrides'));
  }

  return config;
}

/**
 * Defaults with the given overrides applied; no file or environment lookup
 */
export function resolveConfig(overrides?: PartialValidatorConfig): ValidatorConfig {
  const config = getDefaultConfig();
  return overrides ? mergeConfig(config, validatePartialConfig(overrides, 'overrides')) : config;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function validatePartialConfig(value: unknown, source: string, filePath?: string): PartialValidatorConfig {
  const parsed = partialConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatZodError(parsed.error)}`, filePath);
  }
  return parsed.data;
}

/**
 * Load configuration from file
 */
function loadConfigFile(configPath?: string): PartialValidatorConfig | null {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError('Configuration file not found', absolutePath);
    }
    return loadConfigFromPath(absolutePath);
  }

  const cwd = process.cwd();
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Load configuration from a specific YAML file
 */
function loadConfigFromPath(filePath: string): PartialValidatorConfig {
  let raw: unknown;
  try {
    raw = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read configuration: ${getErrorMessage(error)}`, filePath);
  }

  logger.debug(`Loaded configuration from ${filePath}`);

  // An empty file parses to undefined
  if (raw === undefined || raw === null) {
    return {};
  }
  return validatePartialConfig(raw, 'config file', filePath);
}

function readIntEnv(name: string): number | undefined {
  const value = process.env[`${ENV_PREFIX}${name}`];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(): PartialValidatorConfig {
  const config: PartialValidatorConfig = {};

  const maxIterations = readIntEnv('MAX_ITERATIONS');
  if (maxIterations !== undefined) {
    config.cycles = { maxIterationsThreshold: maxIterations };
  }

  const timeoutMs = readIntEnv('TIMEOUT_MS');
  const maxDepth = readIntEnv('MAX_DEPTH');
  if (timeoutMs !== undefined || maxDepth !== undefined) {
    config.limits = {};
    if (timeoutMs !== undefined) config.limits.timeoutMs = timeoutMs;
    if (maxDepth !== undefined) config.limits.maxNestingDepth = maxDepth;
  }

  const sdkRoot = process.env[`${ENV_PREFIX}SDK_ROOT`];
  if (sdkRoot) {
    config.imports = { sdkRoot };
  }

  return validatePartialConfig(config, 'environment');
}

/**
 * Deep merge a partial configuration over a complete one
 */
export function mergeConfig(base: ValidatorConfig, override: PartialValidatorConfig): ValidatorConfig {
  return {
    cycles: { ...base.cycles, ...override.cycles },
    connections: { ...base.connections, ...override.connections },
    imports: { ...base.imports, ...override.imports },
    ordering: { ...base.ordering, ...override.ordering },
    limits: { ...base.limits, ...override.limits },
    registry: {
      nodeTypes: {
        ...base.registry.nodeTypes,
        ...(override.registry?.nodeTypes || {}),
      },
    },
  };
}
