/**
 * Value formatter.
 *
 * Renders a resolved node as output text. Three formats are supported:
 *
 * - `text`: scalars in canonical form, tables and arrays as compact TOML
 *   inline values that parse back to the same node.
 * - `json`: JSON text.
 * - `shell`: booleans as `1`/`0`, arrays as space-separated words, tables as
 *   a `.path` reference.
 *
 * @packageDocumentation
 */

import type { ArrayNode, TableNode, TomlNode } from '../document/types.js';
import { formatKey, formatPath, tomlString } from '../path/parser.js';
import type { TomlPath } from '../path/types.js';

export { tomlString };

/**
 * Supported output formats.
 */
export type OutputFormat = 'text' | 'json' | 'shell';

/** All output formats, in help order. */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'shell'];

/**
 * Checks whether a string names an output format.
 *
 * @param value - Candidate format name.
 * @returns True if `value` is an OutputFormat.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Options for formatValue.
 */
export interface FormatOptions {
  /** Output format. */
  format: OutputFormat;
  /** Path the node was resolved from; used for shell table references. */
  path: TomlPath;
}

/**
 * Renders a float so it still reads as a float.
 */
function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function inlineTable(node: TableNode): string {
  if (node.entries.size === 0) {
    return '{}';
  }
  const pairs = [...node.entries].map(
    ([key, value]) => `${formatKey(key)} = ${toInlineToml(value)}`
  );
  return `{ ${pairs.join(', ')} }`;
}

function inlineArray(node: ArrayNode): string {
  return `[${node.items.map(toInlineToml).join(', ')}]`;
}

/**
 * Renders a node as a TOML inline value.
 *
 * `value = <output>` parses back to an equal node.
 *
 * @param node - Node to render.
 * @returns TOML inline value text.
 */
export function toInlineToml(node: TomlNode): string {
  switch (node.kind) {
    case 'table':
      return inlineTable(node);
    case 'array':
      return inlineArray(node);
    case 'string':
      return tomlString(node.value);
    case 'integer':
      return node.value.toString();
    case 'float':
      return formatFloat(node.value);
    case 'boolean':
      return node.value ? 'true' : 'false';
    case 'datetime':
      return node.value;
    default: {
      const exhaustiveCheck: never = node;
      return exhaustiveCheck;
    }
  }
}

/**
 * Renders a node as compact JSON.
 *
 * Integers keep every digit, date-times become strings and non-finite
 * floats become `null`.
 *
 * @param node - Node to render.
 * @returns JSON text.
 */
export function toJson(node: TomlNode): string {
  switch (node.kind) {
    case 'table': {
      const members = [...node.entries].map(
        ([key, value]) => `${JSON.stringify(key)}:${toJson(value)}`
      );
      return `{${members.join(',')}}`;
    }
    case 'array':
      return `[${node.items.map(toJson).join(',')}]`;
    case 'string':
    case 'datetime':
      return JSON.stringify(node.value);
    case 'integer':
      return node.value.toString();
    case 'float':
      return Number.isFinite(node.value) ? JSON.stringify(node.value) : 'null';
    case 'boolean':
      return node.value ? 'true' : 'false';
    default: {
      const exhaustiveCheck: never = node;
      return exhaustiveCheck;
    }
  }
}

/**
 * Renders a node in text format. Strings that contain a line break are
 * quoted, since a line break ends the output.
 */
function toText(node: TomlNode): string {
  if (node.kind === 'string') {
    return /[\r\n]/.test(node.value) ? tomlString(node.value) : node.value;
  }
  return toInlineToml(node);
}

/**
 * Renders one array element for shell output, where a space separates
 * elements.
 */
function toShellWord(node: TomlNode): string {
  switch (node.kind) {
    case 'boolean':
      return node.value ? '1' : '0';
    case 'string':
      return /\s/.test(node.value) ? tomlString(node.value) : node.value;
    default:
      return toInlineToml(node);
  }
}

function toShell(node: TomlNode, path: TomlPath): string {
  switch (node.kind) {
    case 'table':
      return `.${formatPath(path)}`;
    case 'array':
      return node.items.map(toShellWord).join(' ');
    case 'boolean':
      return node.value ? '1' : '0';
    default:
      return toText(node);
  }
}

/**
 * Renders a resolved node for output.
 *
 * @param node - Node to render.
 * @param options - Output format and source path.
 * @returns The rendered value, without a trailing newline.
 *
 * @example
 * ```typescript
 * formatValue({ kind: 'boolean', value: true }); // "true"
 * formatValue({ kind: 'boolean', value: true }, { format: 'shell' }); // "1"
 * ```
 */
export function formatValue(node: TomlNode, options: Partial<FormatOptions> = {}): string {
  const format = options.format ?? 'text';
  switch (format) {
    case 'text':
      return toText(node);
    case 'json':
      return toJson(node);
    case 'shell':
      return toShell(node, options.path ?? []);
    default: {
      const exhaustiveCheck: never = format;
      return exhaustiveCheck;
    }
  }
}
