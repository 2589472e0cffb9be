/**
 * Locating and reading the TOML input of a query.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { PYPROJECT_FILE_NAME } from '../config/defaults.js';
import type { RaiderConfig } from '../config/types.js';
import { safeIsFile, safeReadTextFile, validatePath } from '../utils/safe-fs.js';
import type { CliIo, InputSpec } from './types.js';

/**
 * Error class for input that cannot be found or read.
 */
export class InputFileError extends Error {
  /** Path of the input, when it came from a file. */
  public readonly filePath: string | undefined;
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new InputFileError.
   *
   * @param message - Descriptive error message.
   * @param filePath - The file involved, if any.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, filePath?: string, cause?: Error) {
    super(message);
    this.name = 'InputFileError';
    this.filePath = filePath;
    this.cause = cause;
  }
}

/**
 * Input after location: a display name and, for files, the absolute path.
 */
export type LocatedInput =
  | { readonly kind: 'stdin'; readonly name: string }
  | { readonly kind: 'file'; readonly name: string; readonly filePath: string };

/**
 * Works out where an input spec points.
 *
 * Relative file paths resolve against `cwd`. The pyproject manifest is looked
 * up in `config.projectRoot` when set, else in `cwd`.
 *
 * @param input - Input spec from the command line.
 * @param config - Effective configuration.
 * @param cwd - Working directory.
 * @returns The located input.
 * @throws PathValidationError for an empty or malformed path.
 */
export function locateInput(input: InputSpec, config: RaiderConfig, cwd: string): LocatedInput {
  switch (input.kind) {
    case 'stdin':
      return { kind: 'stdin', name: 'stdin' };
    case 'file':
      return { kind: 'file', name: input.path, filePath: validatePath(input.path, cwd) };
    case 'pyproject': {
      const root = config.projectRoot ?? cwd;
      return {
        kind: 'file',
        name: PYPROJECT_FILE_NAME,
        filePath: validatePath(path.join(root, PYPROJECT_FILE_NAME), cwd),
      };
    }
    default: {
      const exhaustiveCheck: never = input;
      throw new Error(`Unhandled input kind: ${String(exhaustiveCheck)}`);
    }
  }
}

/**
 * Reads the content of a located input.
 *
 * @param input - The located input.
 * @param io - Streams, for stdin.
 * @returns The input text.
 * @throws InputFileError when the file is missing or unreadable.
 */
export async function readInput(input: LocatedInput, io: CliIo): Promise<string> {
  if (input.kind === 'stdin') {
    return io.readStdin();
  }

  if (!(await safeIsFile(input.filePath))) {
    const message =
      input.name === PYPROJECT_FILE_NAME
        ? `<${PYPROJECT_FILE_NAME}> file not found`
        : `File not found: ${input.name}`;
    throw new InputFileError(message, input.filePath);
  }

  try {
    return await safeReadTextFile(input.filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new InputFileError(`Cannot read ${input.name}: ${cause.message}`, input.filePath, cause);
  }
}

/**
 * Reads a stream to the end as UTF-8 text.
 *
 * @param stream - Readable stream, usually process.stdin.
 * @returns The concatenated text.
 */
export async function readStream(stream: AsyncIterable<unknown>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk, 'utf-8'));
    } else if (chunk instanceof Uint8Array) {
      chunks.push(Buffer.from(chunk));
    }
  }
  return Buffer.concat(chunks).toString('utf-8');
}
