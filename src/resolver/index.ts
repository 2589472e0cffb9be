/**
 * Path resolution against a parsed document.
 *
 * @packageDocumentation
 */

export { resolve, tryResolve } from './resolver.js';
export type { ResolveResult } from './resolver.js';
export {
  IndexOutOfRangeError,
  KeyNotFoundError,
  TomlLookupError,
  TypeMismatchError,
} from './errors.js';
export type { ExpectedContainer, LookupErrorKind, QueryErrorKind } from './errors.js';
