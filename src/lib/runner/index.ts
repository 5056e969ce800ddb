/**
 * Runner Module
 *
 * Provides:
 * - One-shot check execution (validate, request, evaluate)
 * - CLI execution with injectable output and fetch
 */

export {
  CheckRunner,
  createCheckRunner,
  runCheck,
  type CheckRunnerOptions,
} from './runner.js';

export { executeCli, type CliIO } from './cli.js';
