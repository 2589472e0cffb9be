/**
 * TOML document loader.
 *
 * Parses TOML 1.0 text with `smol-toml` and converts the parser's plain
 * JavaScript output into the closed `TomlNode` tree.
 *
 * @packageDocumentation
 */

import { parse, TomlDate, TomlError } from 'smol-toml';
import type { DateTimeVariant, TableNode, TomlDocument, TomlNode } from './types.js';

/**
 * Error class for documents that are not valid TOML.
 */
export class DocumentParseError extends Error {
  /** 1-based line of the syntax error, when the parser reports one. */
  public readonly line: number | undefined;
  /** 1-based column of the syntax error, when the parser reports one. */
  public readonly column: number | undefined;
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new DocumentParseError.
   *
   * @param message - Descriptive error message.
   * @param options - Location and underlying error, if known.
   */
  constructor(message: string, options: { line?: number; column?: number; cause?: Error } = {}) {
    super(message);
    this.name = 'DocumentParseError';
    this.line = options.line;
    this.column = options.column;
    this.cause = options.cause;
  }
}

/**
 * Reads the date/time flavour of a parsed date. Dates that did not come from
 * the parser are offset date-times.
 */
function dateTimeVariantOf(value: Date): DateTimeVariant {
  if (!(value instanceof TomlDate)) {
    return 'offset-datetime';
  }
  if (value.isDate()) {
    return 'local-date';
  }
  if (value.isTime()) {
    return 'local-time';
  }
  return value.isLocal() ? 'local-datetime' : 'offset-datetime';
}

/**
 * Renders a date in the form it was written, keeping its offset. A zero
 * millisecond fraction is dropped.
 */
function dateTimeText(value: Date): string {
  return value.toISOString().replace(/\.000(?=Z|[+-]\d{2}:\d{2}|$)/, '');
}

/**
 * Converts a parsed table into a TableNode.
 *
 * @param raw - Parser output for the table.
 * @param location - Dotted location of the table, for error messages.
 * @returns The table node with entries in parser order.
 */
function toTable(raw: object, location: string): TableNode {
  const entries = new Map<string, TomlNode>();
  for (const [key, value] of Object.entries(raw)) {
    entries.set(key, toNode(value, location === '' ? key : `${location}.${key}`));
  }
  return { kind: 'table', entries };
}

/**
 * Converts one value of parser output into a TomlNode.
 *
 * The parser returns TOML integers as bigints, so bigints become `integer`
 * nodes and every JavaScript number becomes a `float` node.
 *
 * @param value - Parser output value.
 * @param location - Dotted location of the value, for error messages.
 * @returns The converted node.
 * @throws DocumentParseError if the value has no TOML counterpart.
 */
export function toNode(value: unknown, location = ''): TomlNode {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      return { kind: 'float', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'object':
      if (value === null) {
        break;
      }
      if (value instanceof Number || value instanceof BigInt || value instanceof String) {
        return toNode(value.valueOf(), location);
      }
      if (value instanceof Boolean) {
        return { kind: 'boolean', value: value.valueOf() };
      }
      if (value instanceof Date) {
        return {
          kind: 'datetime',
          value: dateTimeText(value),
          variant: dateTimeVariantOf(value),
        };
      }
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return {
          kind: 'array',
          items: items.map((item, index) => toNode(item, `${location}[${String(index)}]`)),
        };
      }
      return toTable(value, location);
    default:
      break;
  }

  const where = location === '' ? 'document root' : `'${location}'`;
  throw new DocumentParseError(
    `Unsupported value at ${where}: ${value === null ? 'null' : typeof value}`
  );
}

/**
 * Parses TOML text into a document.
 *
 * @param content - Raw TOML content.
 * @returns The root table of the document.
 * @throws DocumentParseError for invalid TOML syntax.
 *
 * @example
 * ```typescript
 * const document = parseDocument('[package]\nversion = "1.0.0"\n');
 * document.entries.get('package')?.kind; // 'table'
 * ```
 */
export function parseDocument(content: string): TomlDocument {
  let parsed: object;

  try {
    parsed = parse(content, { integersAsBigInt: true });
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    const firstLine = tomlError.message.split('\n')[0]?.trim() ?? tomlError.message;
    const summary = firstLine.replace(/^Invalid TOML document: /, '');
    throw new DocumentParseError(`Invalid TOML syntax: ${summary}`, {
      cause: tomlError,
      ...(error instanceof TomlError ? { line: error.line, column: error.column } : {}),
    });
  }

  return toTable(parsed, '');
}
