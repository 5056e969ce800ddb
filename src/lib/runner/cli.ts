/**
 * CLI Execution
 *
 * Everything the check-http binary does, minus touching the process:
 * output goes through the given writers and the exit code is returned.
 */

import {
  ArgumentError,
  ConfigError,
  USAGE,
  loadCheckConfig,
  parseArgs,
  type CheckConfig,
  type CliArgs,
} from '../config/index.js';
import { formatVerdict, toExitCode, unknown, type OutputMode, type Verdict } from '../checks/index.js';
import type { FetchLike } from '../http/index.js';
import { createComponentLogger } from '../logger/index.js';
import { CheckRunner } from './runner.js';

// ============================================================================
// Types
// ============================================================================

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  fetch?: FetchLike;
}

const defaultIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

// ============================================================================
// Execution
// ============================================================================

function isUsageError(error: unknown): error is ArgumentError | ConfigError {
  return error instanceof ArgumentError || error instanceof ConfigError;
}

/**
 * Run the CLI against argv (without the node/script prefix) and return the exit code
 */
export async function executeCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  // Until argv parses, guess the mode from a literal switch
  let mode: OutputMode = argv.some(arg => arg === '--json' || arg === '--json=true') ? 'json' : 'text';

  const report = (verdict: Verdict): number => {
    io.stdout(formatVerdict(verdict, mode));
    return toExitCode(verdict.level);
  };

  let args: CliArgs;
  let config: CheckConfig;
  try {
    args = parseArgs(argv);
    mode = args.json ? 'json' : 'text';
    if (args.help) {
      io.stdout(USAGE.trim());
      return 0;
    }
    config = await loadCheckConfig(args.options, args.configPath);
  } catch (error) {
    if (isUsageError(error)) {
      return report(unknown(`invalid configuration: ${error.message}`));
    }
    throw error;
  }

  const logger = createComponentLogger('check-http', {
    enabled: args.verbose,
    write: io.stderr,
  });

  const verdict = await new CheckRunner({ fetch: io.fetch, logger }).run(config);
  return report(verdict);
}
