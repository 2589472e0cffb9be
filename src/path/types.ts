/**
 * Property path types.
 */

/**
 * Table lookup by exact key.
 */
export interface KeySegment {
  readonly kind: 'key';
  readonly key: string;
}

/**
 * Array lookup by zero-based index.
 */
export interface IndexSegment {
  readonly kind: 'index';
  readonly index: number;
}

/**
 * One step of a property path.
 */
export type Segment = KeySegment | IndexSegment;

/**
 * A parsed property path, applied left to right.
 */
export type TomlPath = readonly Segment[];

/**
 * Creates a key segment.
 *
 * @param key - Table key.
 * @returns The segment.
 */
export function keySegment(key: string): KeySegment {
  return { kind: 'key', key };
}

/**
 * Creates an index segment.
 *
 * @param index - Array index.
 * @returns The segment.
 */
export function indexSegment(index: number): IndexSegment {
  return { kind: 'index', index };
}
