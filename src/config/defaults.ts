/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { RaiderConfig } from './types.js';

/**
 * Name of the manifest `--pyproject` looks for.
 */
export const PYPROJECT_FILE_NAME = 'pyproject.toml';

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Readonly<RaiderConfig> = {
  format: 'text',
  quiet: false,
  debug: false,
};
