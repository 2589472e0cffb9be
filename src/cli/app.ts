/**
 * CLI application: context creation and command dispatch.
 */

import {
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveConfig,
  type EnvRecord,
} from '../config/env.js';
import type { PartialConfig } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { CliUsageError, parseArgs } from './args.js';
import { handleQueryCommand } from './commands/query.js';
import { handleVersionCommand } from './commands/version.js';
import { describeError, exitCodeFor, EXIT_CODES, isExpectedError } from './errors.js';
import { readStream } from './input.js';
import type { CliCommandResult, CliContext, CliIo } from './types.js';

/**
 * Options for running the CLI in-process.
 */
export interface RunCliOptions {
  /** Environment; defaults to process.env. */
  env?: EnvRecord;
  /** Working directory; defaults to process.cwd(). */
  cwd?: string;
  /** Streams; defaults to the process streams. */
  io?: CliIo;
}

/**
 * Streams bound to the current process.
 */
export function processIo(): CliIo {
  return {
    stdout: (text: string): void => {
      process.stdout.write(text);
    },
    stderr: (text: string): void => {
      process.stderr.write(text);
    },
    readStdin: () => readStream(process.stdin),
  };
}

/**
 * Builds the usage text.
 */
export function helpText(): string {
  const envLines = Object.entries(getEnvVarDocumentation())
    .map(([name, doc]) => `  ${name.padEnd(20)} ${doc.description}`)
    .join('\n');

  return `Usage: tomlraider [options] <property>

Read a property from a TOML document.

Property paths separate keys with '.' and index arrays with [n]:
  package.version
  tool.pdm.dev-dependencies.dev[1]
  'quoted.key'.value

OPTIONS:
  -f, --file <path>        TOML file to read ('-' for stdin)
  -p, --pyproject          Read pyproject.toml from MESON_SOURCE_ROOT or the cwd
  -j, --json               Print the value as JSON
  -s, --shell              Print the value in shell-friendly form
      --format <format>    Output format: text, json or shell
  -e, --exists             Print nothing; exit 0 if the property exists
  -q, --quiet              Write nothing to stderr
  -d, --debug              Write debug logs to stderr
  -v, --version            Show version information
  -h, --help               Show this help message

ENVIRONMENT:
${envLines}

EXIT CODES:
  0  success
  1  usage error, missing or unreadable input
  2  invalid TOML document
  3  invalid property path
  4  type mismatch
  5  key not found
  6  index out of range
`;
}

/**
 * Creates the CLI context.
 *
 * @param args - Command-line arguments.
 * @param flags - Configuration values set by flags.
 * @param options - Environment, working directory and streams.
 * @returns The context.
 * @throws EnvCoercionError if an environment variable has an invalid value.
 */
export function createCliApp(
  args: string[],
  flags: PartialConfig = {},
  options: RunCliOptions = {}
): CliContext {
  const io = options.io ?? processIo();
  const config = resolveConfig(flags, options.env ?? process.env);
  return {
    args,
    config,
    cwd: options.cwd ?? process.cwd(),
    io,
    logger: new Logger({
      component: 'cli',
      debugMode: config.debug,
      sink: io.stderr,
    }),
  };
}

/**
 * Whether a run asks for debug output, by flag or by environment.
 *
 * A command line that does not parse sets no flag, and invalid environment
 * values are ignored here; `runCli` reports both.
 *
 * @param argv - Arguments after the program name.
 * @param env - Environment; defaults to process.env.
 * @returns True if stack traces should be printed.
 */
export function isDebugRequested(argv: readonly string[], env: EnvRecord = process.env): boolean {
  let flag: boolean | undefined;
  try {
    const parsed = parseArgs(argv);
    flag = parsed.command === 'query' ? parsed.flags.debug : undefined;
  } catch (error) {
    if (!(error instanceof CliUsageError)) {
      throw error;
    }
  }
  return flag ?? readEnvOverrides(env, { collectErrors: true }).overrides.debug === true;
}

/**
 * Runs the CLI with the given arguments.
 *
 * @param argv - Arguments after the program name.
 * @param options - Environment, working directory and streams.
 * @returns The command result.
 */
export async function runCli(
  argv: readonly string[],
  options: RunCliOptions = {}
): Promise<CliCommandResult> {
  const io = options.io ?? processIo();

  try {
    const parsed = parseArgs(argv);
    switch (parsed.command) {
      case 'help':
        io.stdout(helpText());
        return { exitCode: EXIT_CODES.SUCCESS };
      case 'version':
        return handleVersionCommand(io);
      case 'query': {
        const context = createCliApp([...argv], parsed.flags, { ...options, io });
        context.logger.debug('config_resolved', { args: context.args, ...context.config });
        return await handleQueryCommand(parsed, context);
      }
      default: {
        const exhaustiveCheck: never = parsed;
        throw new Error(`Unhandled command: ${String(exhaustiveCheck)}`);
      }
    }
  } catch (error) {
    if (!isExpectedError(error)) {
      throw error;
    }
    const message = describeError(error);
    io.stderr(message + '\n');
    if (error instanceof CliUsageError) {
      io.stderr("Run 'tomlraider --help' for usage information.\n");
    }
    return { exitCode: exitCodeFor(error), message };
  }
}
