/**
 * Property path parsing and formatting.
 *
 * @packageDocumentation
 */

export {
  BARE_KEY_PATTERN,
  InvalidPathSyntaxError,
  PATH_SEPARATOR,
  formatKey,
  formatPath,
  parsePath,
} from './parser.js';
export { indexSegment, keySegment } from './types.js';
export type { IndexSegment, KeySegment, Segment, TomlPath } from './types.js';
