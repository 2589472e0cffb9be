/**
 * Lookup errors raised while resolving a path against a document.
 *
 * @packageDocumentation
 */

import type { NodeKind } from '../document/types.js';
import { formatPath } from '../path/parser.js';
import type { TomlPath } from '../path/types.js';

/**
 * Kinds of lookup failure.
 */
export type LookupErrorKind = 'KeyNotFound' | 'IndexOutOfRange' | 'TypeMismatch';

/**
 * Every error kind the query engine reports.
 */
export type QueryErrorKind = 'InvalidPathSyntax' | LookupErrorKind;

/**
 * Container kind a segment requires.
 */
export type ExpectedContainer = 'table' | 'array';

/**
 * Renders a resolved prefix for messages; the root table prints as `<root>`.
 */
function describePrefix(path: TomlPath): string {
  return path.length === 0 ? '<root>' : formatPath(path);
}

/**
 * Base class for failures of a syntactically valid path against a document.
 */
export abstract class TomlLookupError extends Error {
  /** Discriminant for programmatic handling. */
  public abstract readonly kind: LookupErrorKind;
  /** Segments resolved successfully before the failure. */
  public readonly resolvedPath: TomlPath;

  protected constructor(message: string, resolvedPath: TomlPath) {
    super(message);
    this.resolvedPath = resolvedPath;
  }

  /** Text form of `resolvedPath` (empty string at the root). */
  get resolvedPathText(): string {
    return formatPath(this.resolvedPath);
  }
}

/**
 * A key segment named a key the table does not have.
 */
export class KeyNotFoundError extends TomlLookupError {
  public readonly kind = 'KeyNotFound' as const;
  /** The missing key. */
  public readonly key: string;

  constructor(resolvedPath: TomlPath, key: string) {
    super(`Key '${key}' not found in table ${describePrefix(resolvedPath)}`, resolvedPath);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * An index segment fell outside the array.
 */
export class IndexOutOfRangeError extends TomlLookupError {
  public readonly kind = 'IndexOutOfRange' as const;
  /** The requested index. */
  public readonly index: number;
  /** Length of the array at `resolvedPath`. */
  public readonly length: number;

  constructor(resolvedPath: TomlPath, index: number, length: number) {
    super(
      `Index ${String(index)} out of range for array ${describePrefix(resolvedPath)} of length ${String(length)}`,
      resolvedPath
    );
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * A key segment met a non-table, or an index segment met a non-array.
 */
export class TypeMismatchError extends TomlLookupError {
  public readonly kind = 'TypeMismatch' as const;
  /** Container kind the failing segment needs. */
  public readonly expected: ExpectedContainer;
  /** Kind of the node actually found at `resolvedPath`. */
  public readonly actual: NodeKind;

  constructor(resolvedPath: TomlPath, expected: ExpectedContainer, actual: NodeKind) {
    super(
      `Expected ${describePrefix(resolvedPath)} to be ${expected === 'table' ? 'a table' : 'an array'}, found ${actual}`,
      resolvedPath
    );
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}
