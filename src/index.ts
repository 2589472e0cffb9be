/**
 * tomlraider
 *
 * Reads single properties out of TOML documents by dotted path.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '1.0.0';

export { queryDocument, queryToml, hasProperty } from './query.js';
export type { QueryOptions, QueryResult } from './query.js';

export {
  DocumentParseError,
  NODE_KINDS,
  isContainer,
  parseDocument,
  toNode,
} from './document/index.js';
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
} from './document/index.js';

export {
  BARE_KEY_PATTERN,
  InvalidPathSyntaxError,
  PATH_SEPARATOR,
  formatKey,
  formatPath,
  indexSegment,
  keySegment,
  parsePath,
} from './path/index.js';
export type { IndexSegment, KeySegment, Segment, TomlPath } from './path/index.js';

export {
  IndexOutOfRangeError,
  KeyNotFoundError,
  TomlLookupError,
  TypeMismatchError,
  resolve,
  tryResolve,
} from './resolver/index.js';
export type {
  ExpectedContainer,
  LookupErrorKind,
  QueryErrorKind,
  ResolveResult,
} from './resolver/index.js';

export {
  OUTPUT_FORMATS,
  formatValue,
  isOutputFormat,
  toInlineToml,
  toJson,
  tomlString,
} from './format/index.js';
export type { FormatOptions, OutputFormat } from './format/index.js';

export {
  DEFAULT_CONFIG,
  EnvCoercionError,
  PYPROJECT_FILE_NAME,
  readEnvOverrides,
  resolveConfig,
} from './config/index.js';
export type { EnvRecord, PartialConfig, RaiderConfig } from './config/index.js';

export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
