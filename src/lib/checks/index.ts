/**
 * Checks Module
 *
 * Turns an HTTP response into a health verdict.
 *
 * Provides:
 * - Pre-flight validation of the check configuration
 * - Status-code classification (explicit expectation, 2xx, 3xx)
 * - Required/forbidden body pattern verification
 * - Exit-code and output-line conventions for monitoring systems
 */

export {
  preflight,
  classifyStatus,
  activePattern,
  needsBody,
  verifyBody,
  evaluate,
  type ResponseOutcome,
  type PatternMode,
  type ActivePattern,
  type StatusClassification,
} from './evaluate.js';

export {
  reasonPhrase,
  statusLine,
  isSuccess,
  isRedirect,
} from './status.js';

export {
  EXIT_CODES,
  ok,
  warning,
  critical,
  unknown,
  toExitCode,
  formatVerdict,
  type CheckLevel,
  type Verdict,
  type OutputMode,
} from './verdict.js';
