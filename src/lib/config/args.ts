/**
 * Command-line Arguments
 *
 * Usage:
 *   check-http --url <url> [options]
 *
 * Flags accept both "--flag value" and "--flag=value".
 */

import { ArgumentError } from './errors.js';
import type { CheckFileConfig } from './parser.js';

// ============================================================================
// Types
// ============================================================================

export interface CliArgs {
  /** Check settings given on the command line, same keys as the config file */
  options: CheckFileConfig;
  configPath?: string;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

type ValueFlag = 'url' | 'timeout' | 'response_code' | 'query' | 'negquery' | 'config';
type SwitchFlag = 'redirect_ok' | 'json' | 'verbose' | 'help';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--url', 'url'],
  ['-u', 'url'],
  ['--timeout', 'timeout'],
  ['-t', 'timeout'],
  ['--response-code', 'response_code'],
  ['--query', 'query'],
  ['-q', 'query'],
  ['--negquery', 'negquery'],
  ['-n', 'negquery'],
  ['--config', 'config'],
  ['-c', 'config'],
]);

const SWITCH_FLAGS = new Map<string, SwitchFlag>([
  ['--redirect-ok', 'redirect_ok'],
  ['-r', 'redirect_ok'],
  ['--json', 'json'],
  ['--verbose', 'verbose'],
  ['-v', 'verbose'],
  ['--help', 'help'],
  ['-h', 'help'],
]);

export const USAGE = `
check-http - single-request HTTP health check

Usage:
  check-http --url <url> [options]

Options:
  -u, --url <url>           URL to connect to
  -t, --timeout <seconds>   Time limit, in seconds, for the request (default: 15, 0 disables)
  -r, --redirect-ok         Accept redirection
      --response-code <n>   Expected HTTP status code (default: 200)
  -q, --query <pattern>     Pattern that must exist in the response body
  -n, --negquery <pattern>  Pattern that must be absent from the response body
  -c, --config <file>       Read settings from a YAML or JSON file (flags win)
      --json                Print the verdict as JSON
  -v, --verbose             Write diagnostics to stderr
  -h, --help                Show this help

Exit codes:
  0 OK, 1 WARNING, 2 CRITICAL, 3 UNKNOWN
`;

// ============================================================================
// Parsing
// ============================================================================

function parseInteger(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ArgumentError(`invalid argument "${raw}" for "${flag}": expected a non-negative integer`);
  }
  return Number(raw);
}

function parseSwitchValue(flag: string, raw: string | undefined): boolean {
  if (raw === undefined || raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ArgumentError(`invalid argument "${raw}" for "${flag}": expected true or false`);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = {
    options: {},
    json: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('-') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const switchKey = SWITCH_FLAGS.get(flag);
    if (switchKey) {
      const value = parseSwitchValue(flag, inline);
      if (switchKey === 'redirect_ok') {
        result.options.redirect_ok = value;
      } else {
        result[switchKey] = value;
      }
      continue;
    }

    const valueKey = VALUE_FLAGS.get(flag);
    if (!valueKey) {
      if (arg.startsWith('-')) {
        throw new ArgumentError(`unknown flag: ${flag}`);
      }
      throw new ArgumentError(`unexpected argument: ${arg}`);
    }

    let value = inline;
    if (value === undefined) {
      if (i + 1 >= argv.length) {
        throw new ArgumentError(`flag needs an argument: ${flag}`);
      }
      value = argv[++i];
    }

    switch (valueKey) {
      case 'timeout':
      case 'response_code':
        result.options[valueKey] = parseInteger(flag, value);
        break;
      case 'config':
        result.configPath = value;
        break;
      default:
        result.options[valueKey] = value;
    }
  }

  return result;
}
