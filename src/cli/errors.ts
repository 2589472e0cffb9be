/**
 * Mapping from errors to CLI exit codes and messages.
 *
 * Every error the CLI can meet is classified here, so commands never pick
 * exit codes themselves.
 *
 * @packageDocumentation
 */

import { EnvCoercionError } from '../config/env.js';
import { DocumentParseError } from '../document/loader.js';
import { InvalidPathSyntaxError } from '../path/parser.js';
import { TomlLookupError } from '../resolver/errors.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { CliUsageError } from './args.js';
import { InputFileError } from './input.js';

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_DOCUMENT: 2,
  INVALID_PATH_SYNTAX: 3,
  TYPE_MISMATCH: 4,
  KEY_NOT_FOUND: 5,
  INDEX_OUT_OF_RANGE: 6,
} as const;

/**
 * One of the exit codes above.
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Prefix of every message the CLI writes to stderr.
 */
export const MESSAGE_PREFIX = 'tomlraider';

/**
 * Returns the exit code for an error.
 *
 * @param error - Anything thrown while running a command.
 * @returns The exit code; unknown errors map to 1.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof InvalidPathSyntaxError) {
    return EXIT_CODES.INVALID_PATH_SYNTAX;
  }
  if (error instanceof DocumentParseError) {
    return EXIT_CODES.INVALID_DOCUMENT;
  }
  if (error instanceof TomlLookupError) {
    switch (error.kind) {
      case 'KeyNotFound':
        return EXIT_CODES.KEY_NOT_FOUND;
      case 'IndexOutOfRange':
        return EXIT_CODES.INDEX_OUT_OF_RANGE;
      case 'TypeMismatch':
        return EXIT_CODES.TYPE_MISMATCH;
      default: {
        const exhaustiveCheck: never = error.kind;
        throw new Error(`Unhandled lookup error kind: ${String(exhaustiveCheck)}`);
      }
    }
  }
  return EXIT_CODES.GENERAL_ERROR;
}

/**
 * Whether an error is one the CLI reports as a plain message.
 *
 * @param error - Anything thrown while running a command.
 * @returns False for programming errors, which also get a stack trace in debug mode.
 */
export function isExpectedError(error: unknown): boolean {
  return (
    error instanceof InvalidPathSyntaxError ||
    error instanceof DocumentParseError ||
    error instanceof TomlLookupError ||
    error instanceof CliUsageError ||
    error instanceof InputFileError ||
    error instanceof EnvCoercionError ||
    error instanceof PathValidationError
  );
}

/**
 * Builds the message line printed for an error.
 *
 * @param error - Anything thrown while running a command.
 * @param inputName - Display name of the input, used for document errors.
 * @returns The line, without trailing newline.
 *
 * @example
 * ```typescript
 * describeError(new CliUsageError('Missing property path'));
 * // "tomlraider: Missing property path"
 * ```
 */
export function describeError(error: unknown, inputName?: string): string {
  if (error instanceof DocumentParseError && inputName !== undefined) {
    return `${MESSAGE_PREFIX}: error decoding ${inputName}, ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${MESSAGE_PREFIX}: ${message}`;
}
