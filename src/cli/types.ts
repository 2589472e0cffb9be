/**
 * CLI types and interfaces.
 */

import type { PartialConfig, RaiderConfig } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Where the TOML document is read from.
 */
export type InputSpec =
  | { readonly kind: 'stdin' }
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'pyproject' };

/**
 * Options of a property query, as given on the command line.
 */
export interface QueryArgs {
  readonly command: 'query';
  /** Raw property path string. */
  readonly property: string;
  readonly input: InputSpec;
  /** Report existence through the exit code instead of printing. */
  readonly exists: boolean;
  /** Configuration values set by flags. */
  readonly flags: PartialConfig;
}

/**
 * Parsed command line.
 */
export type ParsedArgs =
  | { readonly command: 'help' }
  | { readonly command: 'version' }
  | QueryArgs;

/**
 * Process streams used by commands.
 */
export interface CliIo {
  /** Writes to standard output. */
  stdout: (text: string) => void;
  /** Writes to standard error. */
  stderr: (text: string) => void;
  /** Reads standard input to the end. */
  readStdin: () => Promise<string>;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments.
   */
  args: string[];

  /**
   * Effective configuration (flags > env > defaults).
   */
  config: RaiderConfig;

  /**
   * Directory relative input paths are resolved against.
   */
  cwd: string;

  io: CliIo;

  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}
