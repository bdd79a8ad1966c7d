/**
 * Configuration loader
 *
 * Loads, parses, and validates the plugin configuration file.
 * Merges user configuration with defaults.
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
  IMAGE_REF_ENV_VAR,
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
  /** Environment to read overrides from (default: process.env) */
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
  /** Whether default configuration is being used */
  usingDefaults: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
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
 * Nested `conftest` settings are merged key by key; zod validates the result.
 */
function mergeConfigs(defaults: Config, user: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults, ...user };

  if (isRecord(user.conftest)) {
    merged.conftest = { ...defaults.conftest, ...user.conftest };
  } else if (user.conftest === undefined || user.conftest === null) {
    merged.conftest = { ...defaults.conftest };
  }

  return merged;
}

/**
 * Apply the image reference environment override, if set.
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const imageRef = env[IMAGE_REF_ENV_VAR]?.trim();
  if (!imageRef || !isRecord(config.conftest)) {
    return config;
  }
  return { ...config, conftest: { ...config.conftest, imageRef } };
}

/**
 * Load and validate the plugin configuration.
 *
 * @param options - Loading options
 * @returns Loaded configuration result
 * @throws ConfigParseError if YAML syntax is invalid
 * @throws ConfigValidationError if schema validation fails
 * @throws ConfigReadError if file cannot be read
 */
export function loadConfig(options: LoadConfigOptions = {}): Promise<LoadConfigResult> {
  return Promise.resolve().then(() => {
    const { configPath, workingDirectory = process.cwd(), env = process.env } = options;

    const resolvedWorkDir = resolve(workingDirectory);
    const configFile = findConfigFile(configPath, resolvedWorkDir);

    const useDefaults = (file: string | null): LoadConfigResult => ({
      config: validateConfig(applyEnvOverrides({ ...getDefaultConfig() }, env)),
      configFile: file,
      usingDefaults: true,
    });

    if (!configFile) {
      if (configPath && configPath !== DEFAULT_CONFIG_FILENAME) {
        core.warning(`Configuration file not found at '${configPath}', using defaults`);
      } else {
        core.debug('No configuration file found, using defaults');
      }
      return useDefaults(null);
    }

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

    let parsedYaml: unknown;
    try {
      parsedYaml = yamlLoad(fileContent);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigParseError(
        `Invalid YAML syntax in configuration file: ${message}`,
        configFile,
        error instanceof Error ? error : undefined
      );
    }

    if (parsedYaml === null || parsedYaml === undefined) {
      core.debug('Configuration file is empty, using defaults');
      return useDefaults(configFile);
    }

    if (!isRecord(parsedYaml)) {
      throw new ConfigParseError(
        'Configuration file must contain a YAML mapping at the top level',
        configFile
      );
    }

    const merged = applyEnvOverrides(mergeConfigs(getDefaultConfig(), parsedYaml), env);

    try {
      return {
        config: validateConfig(merged),
        configFile,
        usingDefaults: false,
      };
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        throw new ConfigValidationError(
          `Configuration validation failed in '${configFile}':\n${error.formatErrors()}`,
          error.errors
        );
      }
      throw error;
    }
  });
}
