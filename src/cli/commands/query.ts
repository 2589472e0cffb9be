/**
 * Query command handler: reads one property from a TOML document.
 */

import { parseDocument } from '../../document/loader.js';
import { formatValue } from '../../format/formatter.js';
import { parsePath } from '../../path/parser.js';
import { TomlLookupError } from '../../resolver/errors.js';
import { resolve } from '../../resolver/resolver.js';
import {
  describeError,
  exitCodeFor,
  EXIT_CODES,
  isExpectedError,
  MESSAGE_PREFIX,
} from '../errors.js';
import { locateInput, readInput, type LocatedInput } from '../input.js';
import type { CliCommandResult, CliContext, QueryArgs } from '../types.js';

/**
 * Handles a property query.
 *
 * The path is parsed before the input is touched. With `exists` set nothing
 * is printed on success, and lookup failures exit with their code silently.
 *
 * @param args - Parsed query arguments.
 * @param context - CLI context.
 * @returns The command result.
 */
export async function handleQueryCommand(
  args: QueryArgs,
  context: CliContext
): Promise<CliCommandResult> {
  const { config, io } = context;
  const logger = context.logger.child('query');
  let input: LocatedInput | undefined;

  try {
    const path = parsePath(args.property);
    logger.debug('path_parsed', { property: args.property, segments: path.length });

    input = locateInput(args.input, config, context.cwd);
    if (!config.quiet) {
      io.stderr(`${MESSAGE_PREFIX}: Reading property ${args.property} from ${input.name}...\n`);
    }

    const content = await readInput(input, io);
    logger.debug('input_read', { source: input.name, bytes: Buffer.byteLength(content) });

    const document = parseDocument(content);
    logger.debug('document_loaded', { keys: document.entries.size });

    const node = resolve(document, path);
    logger.debug('property_resolved', { kind: node.kind });

    if (!args.exists) {
      io.stdout(formatValue(node, { format: config.format, path }) + '\n');
    }
    return { exitCode: EXIT_CODES.SUCCESS };
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logger.debug('query_failed', {
      exitCode,
      error: error instanceof Error ? error.name : typeof error,
    });

    if (args.exists && error instanceof TomlLookupError) {
      return { exitCode };
    }
    if (!isExpectedError(error)) {
      throw error;
    }

    const message = describeError(error, input?.name);
    if (!config.quiet) {
      io.stderr(message + '\n');
    }
    return { exitCode, message };
  }
}
