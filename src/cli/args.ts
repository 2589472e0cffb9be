/**
 * Command-line argument parsing.
 *
 * @packageDocumentation
 */

import type { PartialConfig } from '../config/types.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../format/formatter.js';
import type { InputSpec, ParsedArgs } from './types.js';

/**
 * Error for command lines that cannot be interpreted.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - What is wrong with the command line.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Short flags that take no value. */
const SHORT_SWITCHES: Readonly<Record<string, string>> = {
  j: '--json',
  s: '--shell',
  p: '--pyproject',
  e: '--exists',
  q: '--quiet',
  d: '--debug',
  h: '--help',
  v: '--version',
};

/**
 * Expands bundled short switches (`-jq`) and `--name=value` forms into
 * separate tokens.
 */
function normalize(argv: readonly string[]): string[] {
  const tokens: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      tokens.push(...argv.slice(i));
      break;
    }
    if (arg.startsWith('--') && arg.includes('=')) {
      const eq = arg.indexOf('=');
      tokens.push(arg.slice(0, eq), arg.slice(eq + 1));
      continue;
    }
    if (/^-[a-z]{2,}$/.test(arg)) {
      const letters = arg.slice(1).split('');
      const last = letters[letters.length - 1];
      for (const letter of letters) {
        const long = SHORT_SWITCHES[letter];
        if (long !== undefined) {
          tokens.push(long);
        } else if (letter === 'f' && letter === last) {
          tokens.push('--file');
        } else {
          throw new CliUsageError(`Unknown option: -${letter}`);
        }
      }
      continue;
    }
    tokens.push(arg);
  }
  return tokens;
}

/**
 * Parses the arguments that follow the program name.
 *
 * `--help` and `--version` win over everything else. A query needs exactly
 * one property path; without `--file` or `--pyproject` the document is read
 * from stdin.
 *
 * @param argv - Arguments, without the node binary and script path.
 * @returns The parsed command.
 * @throws CliUsageError for unknown options, missing values or conflicts.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const tokens = normalize(argv);
  const positionals: string[] = [];
  const flags: PartialConfig = {};
  const formats = new Set<OutputFormat>();
  let file: string | undefined;
  let pyproject = false;
  let exists = false;
  let help = false;
  let version = false;

  const valueFor = (option: string, index: number): string => {
    const value = tokens[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Option ${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    switch (token) {
      case '--':
        positionals.push(...tokens.slice(i + 1));
        i = tokens.length;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      case '-v':
      case '--version':
        version = true;
        break;
      case '-j':
      case '--json':
        formats.add('json');
        break;
      case '-s':
      case '--shell':
        formats.add('shell');
        break;
      case '--format': {
        const value = valueFor(token, i);
        if (!isOutputFormat(value)) {
          throw new CliUsageError(
            `Invalid value for --format: expected one of ${OUTPUT_FORMATS.join(', ')}, got '${value}'`
          );
        }
        formats.add(value);
        i++;
        break;
      }
      case '-f':
      case '--file':
        if (file !== undefined) {
          throw new CliUsageError('Option --file given more than once');
        }
        file = valueFor(token, i);
        i++;
        break;
      case '-p':
      case '--pyproject':
        pyproject = true;
        break;
      case '-e':
      case '--exists':
        exists = true;
        break;
      case '-q':
      case '--quiet':
        flags.quiet = true;
        break;
      case '-d':
      case '--debug':
        flags.debug = true;
        break;
      default:
        if (token.startsWith('-') && token !== '-') {
          throw new CliUsageError(`Unknown option: ${token}`);
        }
        positionals.push(token);
    }
  }

  if (help) {
    return { command: 'help' };
  }
  if (version) {
    return { command: 'version' };
  }

  if (formats.size > 1) {
    throw new CliUsageError(`Conflicting output formats: ${[...formats].join(', ')}`);
  }
  const [format] = formats;
  if (format !== undefined) {
    flags.format = format;
  }

  if (file !== undefined && pyproject) {
    throw new CliUsageError('Options --file and --pyproject are mutually exclusive');
  }

  const [property, ...extra] = positionals;
  if (property === undefined) {
    throw new CliUsageError('Missing property path');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  let input: InputSpec = { kind: 'stdin' };
  if (pyproject) {
    input = { kind: 'pyproject' };
  } else if (file !== undefined && file !== '-') {
    input = { kind: 'file', path: file };
  }

  return { command: 'query', property, input, exists, flags };
}
