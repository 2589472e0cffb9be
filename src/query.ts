/**
 * One-call property queries over TOML text.
 *
 * @packageDocumentation
 */

import { parseDocument } from './document/loader.js';
import type { TomlDocument, TomlNode } from './document/types.js';
import { formatValue, type OutputFormat } from './format/formatter.js';
import { parsePath } from './path/parser.js';
import type { TomlPath } from './path/types.js';
import { resolve, tryResolve } from './resolver/resolver.js';

/**
 * Options for queryToml.
 */
export interface QueryOptions {
  /** Output format; defaults to `text`. */
  format?: OutputFormat;
}

/**
 * A resolved property with its rendered form.
 */
export interface QueryResult {
  /** The parsed path. */
  readonly path: TomlPath;
  /** The node the path resolved to. */
  readonly node: TomlNode;
  /** The node rendered in the requested format. */
  readonly output: string;
}

/**
 * Resolves and renders a property of an already parsed document.
 *
 * @param document - Parsed document.
 * @param pathText - Property path string.
 * @param options - Query options.
 * @returns The resolved node and its rendering.
 * @throws InvalidPathSyntaxError for a malformed path.
 * @throws TomlLookupError subclasses when the path does not resolve.
 */
export function queryDocument(
  document: TomlDocument,
  pathText: string,
  options: QueryOptions = {}
): QueryResult {
  const path = parsePath(pathText);
  const node = resolve(document, path);
  return {
    path,
    node,
    output: formatValue(node, { format: options.format ?? 'text', path }),
  };
}

/**
 * Reads a property from TOML text.
 *
 * The path is parsed before the document, so a malformed path is reported
 * even when the document is invalid too.
 *
 * @param content - TOML text.
 * @param pathText - Property path string.
 * @param options - Query options.
 * @returns The rendered value.
 * @throws InvalidPathSyntaxError for a malformed path.
 * @throws DocumentParseError for invalid TOML.
 * @throws TomlLookupError subclasses when the path does not resolve.
 *
 * @example
 * ```typescript
 * queryToml('[package]\nversion = "1.0.0"\n', 'package.version'); // "1.0.0"
 * ```
 */
export function queryToml(content: string, pathText: string, options: QueryOptions = {}): string {
  const path = parsePath(pathText);
  const node = resolve(parseDocument(content), path);
  return formatValue(node, { format: options.format ?? 'text', path });
}

/**
 * Checks whether a property exists in TOML text.
 *
 * Lookup failures yield `false`; a malformed path or invalid TOML still
 * throws.
 *
 * @param content - TOML text.
 * @param pathText - Property path string.
 * @returns True if the path resolves.
 */
export function hasProperty(content: string, pathText: string): boolean {
  const path = parsePath(pathText);
  return tryResolve(parseDocument(content), path).success;
}
