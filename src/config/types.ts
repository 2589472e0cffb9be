/**
 * Configuration types.
 *
 * @packageDocumentation
 */

import type { OutputFormat } from '../format/formatter.js';

/**
 * Settings that control a query run.
 */
export interface RaiderConfig {
  /** Output format for the resolved value. */
  format: OutputFormat;
  /** Suppress notices and error messages on stderr. */
  quiet: boolean;
  /** Write structured debug logs to stderr. */
  debug: boolean;
  /** Directory searched for pyproject.toml; the cwd when unset. */
  projectRoot?: string;
}

/**
 * Partial configuration used for layering overrides.
 */
export type PartialConfig = Partial<RaiderConfig>;
