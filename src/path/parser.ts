/**
 * Property path parser.
 *
 * Grammar:
 *
 * ```
 * path    := segment ('.' segment)*
 * segment := key ('[' integer ']')*
 * key     := bare-key | quoted-key
 * ```
 *
 * Bare keys match `[A-Za-z0-9_-]+`. Quoted keys use `"` (TOML basic string
 * escapes apply) or `'` (literal) and may contain dots and brackets.
 *
 * @packageDocumentation
 */

import { indexSegment, keySegment, type Segment, type TomlPath } from './types.js';

/** Separator between key segments. */
export const PATH_SEPARATOR = '.';

/** Regex pattern for a complete bare key. */
export const BARE_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  b: '\b',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
};

const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\f': '\\f',
  '\r': '\\r',
  '"': '\\"',
  '\\': '\\\\',
};

/**
 * Error raised for a path string that does not follow the path grammar.
 */
export class InvalidPathSyntaxError extends Error {
  /** Error kind, shared with the lookup errors. */
  public readonly kind = 'InvalidPathSyntax' as const;
  /** The path string that failed to parse. */
  public readonly path: string;
  /** Zero-based offset in `path` where parsing stopped. */
  public readonly position: number;

  /**
   * Creates a new InvalidPathSyntaxError.
   *
   * @param reason - What is wrong at `position`.
   * @param path - The full path string.
   * @param position - Offset of the problem.
   */
  constructor(reason: string, path: string, position: number) {
    super(`Invalid property path '${path}': ${reason} at position ${String(position)}`);
    this.name = 'InvalidPathSyntaxError';
    this.path = path;
    this.position = position;
  }
}

/**
 * Cursor over the path string.
 */
class PathScanner {
  private pos = 0;

  constructor(private readonly source: string) {}

  get position(): number {
    return this.pos;
  }

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  peek(): string | undefined {
    return this.source[this.pos];
  }

  next(): string | undefined {
    const char = this.source[this.pos];
    this.pos++;
    return char;
  }

  fail(reason: string, position = this.pos): never {
    throw new InvalidPathSyntaxError(reason, this.source, position);
  }

  readKey(): string {
    const char = this.peek();
    if (char === undefined || char === PATH_SEPARATOR) {
      return this.fail('empty key');
    }
    if (char === '"') {
      return this.readBasicKey();
    }
    if (char === "'") {
      return this.readLiteralKey();
    }
    if (char === '[') {
      return this.fail('index without a key');
    }
    return this.readBareKey();
  }

  readIndices(segments: Segment[]): void {
    while (this.peek() === '[') {
      const open = this.pos;
      this.pos++;
      const start = this.pos;
      while (this.peek() !== undefined && this.peek() !== ']') {
        if (this.peek() === '[') {
          this.fail('unbalanced brackets');
        }
        this.pos++;
      }
      if (this.done) {
        this.fail('unbalanced brackets', open);
      }
      const digits = this.source.slice(start, this.pos);
      this.pos++;
      if (!/^[0-9]+$/.test(digits)) {
        this.fail(`malformed index '${digits}'`, start);
      }
      const index = Number(digits);
      if (!Number.isSafeInteger(index)) {
        this.fail(`index '${digits}' is too large`, start);
      }
      segments.push(indexSegment(index));
    }
  }

  private readBareKey(): string {
    const start = this.pos;
    while (this.peek() !== undefined && BARE_KEY_CHAR.test(this.peek() ?? '')) {
      this.pos++;
    }
    if (this.pos === start) {
      const char = this.peek() ?? '';
      return this.fail(char === ']' ? 'unbalanced brackets' : `unexpected character '${char}'`);
    }
    return this.source.slice(start, this.pos);
  }

  private readLiteralKey(): string {
    const open = this.pos;
    this.pos++;
    const end = this.source.indexOf("'", this.pos);
    if (end === -1) {
      return this.fail('unterminated quote', open);
    }
    const key = this.source.slice(this.pos, end);
    this.pos = end + 1;
    return key;
  }

  private readBasicKey(): string {
    const open = this.pos;
    this.pos++;
    let key = '';
    for (;;) {
      const char = this.next();
      if (char === undefined) {
        return this.fail('unterminated quote', open);
      }
      if (char === '"') {
        return key;
      }
      if (char !== '\\') {
        key += char;
        continue;
      }
      key += this.readEscape();
    }
  }

  private readEscape(): string {
    const escapeStart = this.pos - 1;
    const code = this.next();
    if (code === undefined) {
      return this.fail('unterminated quote', escapeStart);
    }
    const simple = SIMPLE_ESCAPES[code];
    if (simple !== undefined) {
      return simple;
    }
    if (code === 'u' || code === 'U') {
      const length = code === 'u' ? 4 : 8;
      const hex = this.source.slice(this.pos, this.pos + length);
      if (!new RegExp(`^[0-9A-Fa-f]{${String(length)}}$`).test(hex)) {
        return this.fail(`invalid unicode escape '\\${code}${hex}'`, escapeStart);
      }
      const codePoint = Number.parseInt(hex, 16);
      if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        return this.fail(`invalid unicode scalar '\\${code}${hex}'`, escapeStart);
      }
      this.pos += length;
      return String.fromCodePoint(codePoint);
    }
    return this.fail(`invalid escape '\\${code}'`, escapeStart);
  }
}

/**
 * Parses a property path string into segments.
 *
 * @param path - Path such as `package.dependencies[0].name`.
 * @returns The segments, keys and indices in order.
 * @throws InvalidPathSyntaxError if the string does not follow the grammar.
 *
 * @example
 * ```typescript
 * parsePath('tool."my.tool".args[1]');
 * // [key 'tool', key 'my.tool', key 'args', index 1]
 * ```
 */
export function parsePath(path: string): TomlPath {
  const scanner = new PathScanner(path);
  const segments: Segment[] = [];

  if (path.length === 0) {
    scanner.fail('empty path');
  }

  for (;;) {
    segments.push(keySegment(scanner.readKey()));
    scanner.readIndices(segments);

    if (scanner.done) {
      return segments;
    }
    const separatorAt = scanner.position;
    const char = scanner.next();
    if (char !== PATH_SEPARATOR) {
      scanner.fail(
        char === ']' ? 'unbalanced brackets' : `unexpected character '${char ?? ''}'`,
        separatorAt
      );
    }
    if (scanner.done) {
      scanner.fail('empty key');
    }
  }
}

/**
 * Quotes a key for output in a path or TOML inline table.
 *
 * Bare keys are returned unchanged; anything else becomes a basic string.
 *
 * @param key - Key to render.
 * @returns The key as path text.
 */
export function formatKey(key: string): string {
  return BARE_KEY_PATTERN.test(key) ? key : tomlString(key);
}

/**
 * Renders a string as a TOML basic string. Control characters are escaped,
 * so the result is a single line.
 *
 * @param value - String to quote.
 * @returns The quoted, escaped string.
 */
export function tomlString(value: string): string {
  let out = '"';
  for (const char of value) {
    const named = NAMED_ESCAPES[char];
    if (named !== undefined) {
      out += named;
    } else if (CONTROL_CHARACTER.test(char)) {
      out += `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
    } else {
      out += char;
    }
  }
  return out + '"';
}

/**
 * Serializes segments back into path text.
 *
 * The output parses back to the same segments. An empty path formats as the
 * empty string.
 *
 * @param path - Segments to render.
 * @returns The path string.
 */
export function formatPath(path: TomlPath): string {
  let out = '';
  for (const segment of path) {
    if (segment.kind === 'index') {
      out += `[${String(segment.index)}]`;
    } else {
      out += out === '' ? formatKey(segment.key) : PATH_SEPARATOR + formatKey(segment.key);
    }
  }
  return out;
}
