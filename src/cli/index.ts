#!/usr/bin/env node

/**
 * tomlraider CLI entry point.
 */

import { isDebugRequested, runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

const argv = process.argv.slice(2);

await withErrorHandling(() => runCli(argv), { debug: isDebugRequested(argv) });
