#!/usr/bin/env node
/**
 * CLI: HTTP Health Check
 *
 * Usage:
 *   check-http --url <url> [options]
 *
 * Example:
 *   check-http -u https://example.com/health -t 5 -q '"status":"up"'
 *
 * Prints one report line and exits 0 (OK), 1 (WARNING), 2 (CRITICAL) or 3 (UNKNOWN).
 */

import { executeCli } from '../lib/runner/index.js';
import { EXIT_CODES, formatVerdict, unknown } from '../lib/checks/index.js';
import { describeError } from '../lib/http/index.js';

async function main() {
  process.exitCode = await executeCli(process.argv.slice(2));
}

main().catch((error) => {
  console.log(formatVerdict(unknown(`unexpected error: ${describeError(error)}`)));
  process.exit(EXIT_CODES.unknown);
});
