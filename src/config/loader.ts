/**
 * Configuration loader
 *
 * Loads, parses, and validates the policy gate configuration file, merges it
 * with defaults and applies environment overrides.
 *
 * Precedence (highest first): environment, config file, defaults.
 *
 * @module config/loader
 */

import * as core from '@actions/core';
import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { load as yamlLoad } from 'js-yaml';

import { type Config, validateConfig, ConfigValidationError } from './schema';
import {
  DEFAULT_CONFIG_FILENAME,
  ALTERNATIVE_CONFIG_FILENAMES,
  ENV_OVERRIDES,
  getDefaultConfig,
} from './defaults';

/**
 * Error thrown when configuration file has invalid YAML syntax.
 */
export class ConfigParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigParseError';
  }
}

/**
 * Error thrown when configuration file cannot be read.
 */
export class ConfigReadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigReadError';
  }
}

// Re-export for convenience
export { ConfigValidationError };

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Path to configuration file (relative to workingDirectory or absolute) */
  configPath?: string;
  /** Working directory (default: process.cwd()) */
  workingDirectory?: string;
  /** Environment used for overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Result of loading configuration.
 */
export interface LoadConfigResult {
  /** The loaded and validated configuration */
  config: Config;
  /** Path to the configuration file that was loaded (null if using defaults) */
  configFile: string | null;
  /** Whether no configuration file contributed settings */
  usingDefaults: boolean;
  /** Environment variables that overrode settings */
  overrides: string[];
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the configuration file path.
 *
 * @param configPath - Explicit config path (if provided)
 * @param workingDirectory - Base directory to search from
 * @returns Resolved path to config file, or null if not found
 */
function findConfigFile(configPath: string | undefined, workingDirectory: string): string | null {
  // If explicit path provided, use it directly
  if (configPath && configPath !== DEFAULT_CONFIG_FILENAME) {
    const absolutePath = resolve(workingDirectory, configPath);
    return existsSync(absolutePath) ? absolutePath : null;
  }

  const defaultPath = join(workingDirectory, DEFAULT_CONFIG_FILENAME);
  if (existsSync(defaultPath)) {
    return defaultPath;
  }

  for (const filename of ALTERNATIVE_CONFIG_FILENAMES) {
    const altPath = join(workingDirectory, filename);
    if (existsSync(altPath)) {
      return altPath;
    }
  }

  return null;
}

/**
 * Merge user configuration over defaults.
 * Nested sections are merged key by key; arrays are replaced, not merged.
 * Values of the wrong shape are passed through so validation reports them.
 *
 * @param defaults - Default configuration
 * @param user - User-provided configuration
 * @returns Merged, unvalidated configuration
 */
function mergeConfigs(defaults: Config, user: RawConfig): RawConfig {
  const merged: RawConfig = { ...defaults, ...user };

  // YAML reads `version: 1` as a number
  if (typeof user.version === 'number') {
    merged.version = String(user.version);
  }

  if (typeof user.severity_threshold === 'string') {
    merged.severity_threshold = user.severity_threshold.toUpperCase();
  }

  for (const section of ['bypass', 'audit', 'report'] as const) {
    const value = user[section];
    if (isRecord(value)) {
      merged[section] = { ...defaults[section], ...value };
    } else if (value === undefined || value === null) {
      merged[section] = defaults[section];
    }
  }

  return merged;
}

/**
 * Parse a boolean environment value.
 * Unrecognised values are returned unchanged so validation rejects them.
 */
function parseBooleanEnv(value: string): boolean | string {
  const normalised = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalised)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalised)) {
    return false;
  }
  return value;
}

/**
 * Apply environment overrides on top of merged configuration.
 *
 * @returns Names of the variables that were applied
 */
function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): string[] {
  const applied: string[] = [];

  const threshold = env[ENV_OVERRIDES.severityThreshold];
  if (threshold !== undefined && threshold.trim() !== '') {
    config.severity_threshold = threshold.trim().toUpperCase();
    applied.push(ENV_OVERRIDES.severityThreshold);
  }

  const exceptions = env[ENV_OVERRIDES.exceptions];
  if (exceptions !== undefined && exceptions.trim() !== '') {
    config.exceptions = exceptions
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    applied.push(ENV_OVERRIDES.exceptions);
  }

  const bypassEnabled = env[ENV_OVERRIDES.bypassEnabled];
  if (bypassEnabled !== undefined && bypassEnabled.trim() !== '') {
    const bypass = isRecord(config.bypass) ? config.bypass : {};
    config.bypass = { ...bypass, enabled: parseBooleanEnv(bypassEnabled) };
    applied.push(ENV_OVERRIDES.bypassEnabled);
  }

  return applied;
}

/**
 * Read and parse the YAML configuration file.
 *
 * @returns Parsed document, or null for an empty file
 */
function readConfigFile(configFile: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configFile, 'utf-8');
  } catch (error) {
    throw new ConfigReadError(
      `Failed to read configuration file: ${configFile}`,
      configFile,
      error instanceof Error ? error : undefined
    );
  }

  try {
    return yamlLoad(fileContent) ?? null;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown YAML parse error';
    throw new ConfigParseError(
      `Invalid YAML syntax in configuration file: ${message}`,
      configFile,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Load and validate the policy gate configuration.
 *
 * @param options - Loading options
 * @returns Loaded configuration result
 * @throws ConfigParseError if YAML syntax is invalid
 * @throws ConfigValidationError if schema validation fails
 * @throws ConfigReadError if file cannot be read
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const { configPath, workingDirectory = process.cwd(), env = process.env } = options;

  const resolvedWorkDir = resolve(workingDirectory);
  const configFile = findConfigFile(configPath, resolvedWorkDir);
  const defaults = getDefaultConfig();

  let userConfig: unknown = null;
  if (!configFile) {
    if (configPath && configPath !== DEFAULT_CONFIG_FILENAME) {
      // Explicit path was provided but file doesn't exist - warn but continue
      core.warning(`Configuration file not found at '${configPath}', using defaults`);
    } else {
      core.debug('No configuration file found, using defaults');
    }
  } else {
    userConfig = readConfigFile(configFile);
    if (userConfig === null) {
      core.debug('Configuration file is empty, using defaults');
    }
  }

  const usingDefaults = userConfig === null;
  let merged: unknown;
  let overrides: string[] = [];

  if (userConfig === null || isRecord(userConfig)) {
    const raw = mergeConfigs(defaults, userConfig ?? {});
    overrides = applyEnvOverrides(raw, env);
    merged = raw;
  } else {
    // Not a mapping; let validation describe the problem
    merged = userConfig;
  }

  try {
    return {
      config: validateConfig(merged),
      configFile,
      usingDefaults,
      overrides,
    };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      const source = configFile ? `'${configFile}'` : 'environment overrides';
      throw new ConfigValidationError(
        `Configuration validation failed in ${source}:\n${error.formatErrors()}`,
        error.errors
      );
    }
    throw error;
  }
}
