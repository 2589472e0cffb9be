/**
 * Shared error handling for the CLI entry point.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Runs a command and sets the process exit code from its result.
 *
 * - On success: sets the result's exit code
 * - On error: prints the message (and the stack in debug mode) and sets 1
 *
 * The exit code is set rather than forced so pending stdout writes flush.
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Set `debug` to print stack traces of unexpected errors.
 * @returns A promise that settles once the exit code is set.
 */
export async function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: { debug?: boolean } = {}
): Promise<void> {
  try {
    const result = await fn();
    process.exitCode = result.exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`tomlraider: ${error.message}`);
      if (options.debug === true && error.stack !== undefined) {
        console.error(error.stack);
      }
    } else {
      console.error(`tomlraider: ${String(error)}`);
    }
    process.exitCode = 1;
  }
}
