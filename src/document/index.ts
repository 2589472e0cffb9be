/**
 * TOML document model and loader.
 *
 * @packageDocumentation
 */

export { DocumentParseError, parseDocument, toNode } from './loader.js';
export { NODE_KINDS, isContainer } from './types.js';
export type {
  ArrayNode,
  BooleanNode,
  DateTimeNode,
  DateTimeVariant,
  FloatNode,
  IntegerNode,
  NodeKind,
  ScalarNode,
  StringNode,
  TableNode,
  TomlDocument,
  TomlNode,
} from './types.js';
