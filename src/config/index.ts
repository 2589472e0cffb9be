/**
 * Configuration: defaults and environment overrides.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

export type { PartialConfig, RaiderConfig } from './types.js';
export { DEFAULT_CONFIG, PYPROJECT_FILE_NAME } from './defaults.js';
export {
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveConfig,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
