/**
 * Config Module
 *
 * Provides:
 * - Command-line flag parsing
 * - YAML and JSON config files
 * - Zod-validated schemas
 * - Default configuration merging
 */

export {
  ConfigParser,
  createConfigParser,
  loadCheckConfig,
  DEFAULT_CONFIG,
  MAX_TIMEOUT_SECONDS,
  CheckFileSchema,
  CheckConfigSchema,
  type CheckFileConfig,
  type CheckConfig,
} from './parser.js';

export { parseArgs, USAGE, type CliArgs } from './args.js';

export { ArgumentError, ConfigError } from './errors.js';
