/**
 * Document model for parsed TOML files.
 *
 * Every value of a TOML document is represented as a `TomlNode`, a closed
 * union discriminated on `kind`. There is no null variant; a missing value is
 * reported as a lookup error.
 *
 * @packageDocumentation
 */

/**
 * Node kinds, in the order they are listed in messages.
 */
export const NODE_KINDS = [
  'table',
  'array',
  'string',
  'integer',
  'float',
  'boolean',
  'datetime',
] as const;

/**
 * Discriminant of a TomlNode.
 */
export type NodeKind = (typeof NODE_KINDS)[number];

/**
 * The four TOML date/time flavours.
 */
export type DateTimeVariant = 'offset-datetime' | 'local-datetime' | 'local-date' | 'local-time';

/**
 * A TOML table: string keys mapped to nodes, in source order.
 */
export interface TableNode {
  readonly kind: 'table';
  readonly entries: ReadonlyMap<string, TomlNode>;
}

/**
 * A TOML array. Elements may be of mixed kinds.
 */
export interface ArrayNode {
  readonly kind: 'array';
  readonly items: readonly TomlNode[];
}

export interface StringNode {
  readonly kind: 'string';
  readonly value: string;
}

/**
 * TOML integers are 64-bit, so they are kept as bigint.
 */
export interface IntegerNode {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface FloatNode {
  readonly kind: 'float';
  readonly value: number;
}

export interface BooleanNode {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/**
 * A TOML date, time or date-time.
 */
export interface DateTimeNode {
  readonly kind: 'datetime';
  /** RFC 3339 text of the value. */
  readonly value: string;
  readonly variant: DateTimeVariant;
}

/**
 * Any value in a TOML document.
 */
export type TomlNode =
  | TableNode
  | ArrayNode
  | StringNode
  | IntegerNode
  | FloatNode
  | BooleanNode
  | DateTimeNode;

/**
 * Scalar (non-container) nodes.
 */
export type ScalarNode = StringNode | IntegerNode | FloatNode | BooleanNode | DateTimeNode;

/**
 * A parsed TOML document. The root of a document is always a table.
 */
export type TomlDocument = TableNode;

/**
 * Checks whether a node is a table or an array.
 *
 * @param node - Node to check.
 * @returns True for tables and arrays.
 */
export function isContainer(node: TomlNode): node is TableNode | ArrayNode {
  return node.kind === 'table' || node.kind === 'array';
}
