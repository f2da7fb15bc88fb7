/**
 * Configuration Loader
 *
 * Loads the benchmark session configuration from a YAML file, interpolates
 * ${ENV_VAR} references and validates the result.
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import type { Logger } from 'pino';
import {
  BenchmarkConfigSchema,
  REQUIRED_CONFIG_KEYS,
  type BenchmarkConfig,
} from '../types/schemas/config.js';
import { ConfigurationError, ValidationError, toError } from '../utils/errors.js';
import { DEFAULT_CONFIG_PATH } from './defaults.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Interpolate environment variables in string
 *
 * Replaces ${VAR_NAME} with process.env.VAR_NAME and ${VAR_NAME:-fallback}
 * with the fallback when the variable is unset. Unset without fallback → ''.
 */
export function interpolateEnvVars(content: string, logger?: Logger): string {
  return content.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, fallback: string | undefined) => {
      const value = process.env[varName];
      if (value !== undefined) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      logger?.warn({ varName }, 'Environment variable not found');
      return '';
    }
  );
}

/**
 * Validate an already-parsed configuration document
 *
 * @throws {ConfigurationError} if a required key is absent
 * @throws {ValidationError} if a value has the wrong shape
 */
export function validateConfig(raw: unknown, source = '<inline>'): BenchmarkConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Configuration in ${source} must be a mapping`);
  }

  for (const key of REQUIRED_CONFIG_KEYS) {
    if (!(key in raw)) {
      throw new ConfigurationError(`Configuration key '${key}' is missing in ${source}`);
    }
  }

  try {
    return BenchmarkConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const validationErrors = error.errors.map((err) => ({
        path: err.path.length > 0 ? err.path.join('.') : 'root',
        message: err.message,
      }));
      const details = validationErrors.map((e) => `${e.path}: ${e.message}`).join('\n');
      throw new ValidationError(
        `Configuration validation failed for ${source}:\n${details}`,
        validationErrors,
        error
      );
    }
    throw error;
  }
}

/**
 * Load benchmark configuration from YAML file
 *
 * @param path - Path to YAML configuration file
 * @throws {ConfigurationError} if the file cannot be read or parsed, or a required key is absent
 * @throws {ValidationError} if configuration values are invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig('config/benchmark.yaml');
 * console.log(config.models_to_test, config.iterations);
 * ```
 */
export async function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  logger?: Logger
): Promise<BenchmarkConfig> {
  logger?.debug({ path }, 'Loading benchmark configuration');

  let fileContent: string;
  try {
    fileContent = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ConfigurationError(`Configuration file not found: ${path}`, toError(error));
    }
    throw new ConfigurationError(
      `Failed to read configuration from ${path}: ${toError(error).message}`,
      toError(error)
    );
  }

  let raw: unknown;
  try {
    raw = yaml.load(interpolateEnvVars(fileContent, logger));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration ${path}: ${toError(error).message}`,
      toError(error)
    );
  }

  const config = validateConfig(raw, path);
  logger?.info(
    { path, models: config.models_to_test, iterations: config.iterations },
    'Configuration loaded'
  );
  return config;
}
