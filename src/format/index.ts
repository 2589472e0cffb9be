/**
 * Output rendering for resolved values.
 *
 * @packageDocumentation
 */

export {
  OUTPUT_FORMATS,
  formatValue,
  isOutputFormat,
  toInlineToml,
  toJson,
  tomlString,
} from './formatter.js';
export type { FormatOptions, OutputFormat } from './formatter.js';
