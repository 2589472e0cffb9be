/**
 * Environment variable overrides for configuration.
 *
 * Supports TOMLRAIDER_* variables, plus MESON_SOURCE_ROOT so the tool can
 * find the project manifest when run from a Meson build.
 *
 * Override precedence: command-line flags > env > defaults
 *
 * @packageDocumentation
 */

import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../format/formatter.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { PartialConfig, RaiderConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * How one environment variable maps onto a config field.
 */
type EnvVarMapping =
  | { readonly type: 'format'; readonly field: 'format'; readonly description: string }
  | { readonly type: 'boolean'; readonly field: 'quiet' | 'debug'; readonly description: string }
  | { readonly type: 'string'; readonly field: 'projectRoot'; readonly description: string };

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  TOMLRAIDER_FORMAT: {
    field: 'format',
    type: 'format',
    description: `Default output format (${OUTPUT_FORMATS.join(', ')})`,
  },
  TOMLRAIDER_QUIET: {
    field: 'quiet',
    type: 'boolean',
    description: 'Suppress messages on stderr (true/false)',
  },
  TOMLRAIDER_DEBUG: {
    field: 'debug',
    type: 'boolean',
    description: 'Write structured debug logs to stderr (true/false)',
  },
  MESON_SOURCE_ROOT: {
    field: 'projectRoot',
    type: 'string',
    description: 'Directory searched for pyproject.toml by --pyproject',
  },
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to an output format name.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The output format.
 * @throws EnvCoercionError if the value names no format.
 */
function coerceToFormat(value: string, envVar: string): OutputFormat {
  const trimmed = value.trim().toLowerCase();
  if (isOutputFormat(trimmed)) {
    return trimmed;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'format',
    `Invalid value for '${envVar}': expected one of ${OUTPUT_FORMATS.join(', ')}, got '${value}'`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ TOMLRAIDER_FORMAT: 'json' });
 * result.overrides.format; // 'json'
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      switch (mapping.type) {
        case 'format':
          overrides[mapping.field] = coerceToFormat(value, envVar);
          break;
        case 'boolean':
          overrides[mapping.field] = coerceToBoolean(value, envVar);
          break;
        case 'string':
          overrides[mapping.field] = value;
          break;
      }
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Builds the effective configuration.
 *
 * Override precedence: flags > env > defaults
 *
 * @param flags - Values given on the command line.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The merged configuration.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function resolveConfig(
  flags: PartialConfig = {},
  env: EnvRecord = process.env
): RaiderConfig {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(mergeConfig({ ...DEFAULT_CONFIG }, overrides), flags);
}

/**
 * Merges defined values of a partial configuration over a full one.
 */
function mergeConfig(base: RaiderConfig, partial: PartialConfig): RaiderConfig {
  const merged: RaiderConfig = { ...base };
  if (partial.format !== undefined) {
    merged.format = partial.format;
  }
  if (partial.quiet !== undefined) {
    merged.quiet = partial.quiet;
  }
  if (partial.debug !== undefined) {
    merged.debug = partial.debug;
  }
  if (partial.projectRoot !== undefined) {
    merged.projectRoot = partial.projectRoot;
  }
  return merged;
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
