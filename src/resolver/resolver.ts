/**
 * Path resolver.
 *
 * Walks a document one segment at a time. A key needs a table, an index
 * needs an array; the first segment that cannot be applied stops the walk
 * with a typed error. The document is only read.
 *
 * @packageDocumentation
 */

import type { TomlDocument, TomlNode } from '../document/types.js';
import type { Segment, TomlPath } from '../path/types.js';
import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  TomlLookupError,
  TypeMismatchError,
} from './errors.js';

/**
 * Result of a non-throwing resolution.
 */
export type ResolveResult =
  | {
      readonly success: true;
      readonly node: TomlNode;
    }
  | {
      readonly success: false;
      readonly error: TomlLookupError;
    };

/**
 * Applies one segment to the current node.
 *
 * @param current - Node reached so far.
 * @param segment - Segment to apply.
 * @param resolved - Segments already applied, for error context.
 * @returns The child node.
 */
function step(current: TomlNode, segment: Segment, resolved: TomlPath): TomlNode {
  switch (segment.kind) {
    case 'key': {
      if (current.kind !== 'table') {
        throw new TypeMismatchError(resolved, 'table', current.kind);
      }
      const child = current.entries.get(segment.key);
      if (child === undefined) {
        throw new KeyNotFoundError(resolved, segment.key);
      }
      return child;
    }
    case 'index': {
      if (current.kind !== 'array') {
        throw new TypeMismatchError(resolved, 'array', current.kind);
      }
      const child = current.items[segment.index];
      if (segment.index < 0 || child === undefined) {
        throw new IndexOutOfRangeError(resolved, segment.index, current.items.length);
      }
      return child;
    }
    default: {
      const exhaustiveCheck: never = segment;
      return exhaustiveCheck;
    }
  }
}

/**
 * Resolves a path against a document.
 *
 * An empty path resolves to the root table.
 *
 * @param document - Root table of the document.
 * @param path - Segments to apply in order.
 * @returns The node at the end of the path.
 * @throws KeyNotFoundError if a key is missing from its table.
 * @throws IndexOutOfRangeError if an index is outside its array.
 * @throws TypeMismatchError if a segment meets the wrong kind of node.
 *
 * @example
 * ```typescript
 * const document = parseDocument('[package]\nversion = "1.0.0"\n');
 * resolve(document, parsePath('package.version')); // { kind: 'string', value: '1.0.0' }
 * ```
 */
export function resolve(document: TomlDocument, path: TomlPath): TomlNode {
  let current: TomlNode = document;
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    if (segment === undefined) {
      break;
    }
    current = step(current, segment, path.slice(0, i));
  }
  return current;
}

/**
 * Resolves a path without throwing lookup errors.
 *
 * @param document - Root table of the document.
 * @param path - Segments to apply in order.
 * @returns The node, or the lookup error that stopped the walk.
 */
export function tryResolve(document: TomlDocument, path: TomlPath): ResolveResult {
  try {
    return { success: true, node: resolve(document, path) };
  } catch (error) {
    if (error instanceof TomlLookupError) {
      return { success: false, error };
    }
    throw error;
  }
}
