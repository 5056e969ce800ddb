/**
 * Response Evaluation
 *
 * Maps an HTTP response and the configured expectations to a verdict.
 * Everything here is synchronous and free of I/O: the caller decides
 * whether the body has to be read (see needsBody) and hands it over.
 */

import type { CheckConfig } from '../config/index.js';
import { critical, ok, unknown, warning, type Verdict } from './verdict.js';
import { STATUS_OK, isRedirect, isSuccess, statusLine } from './status.js';

// ============================================================================
// Types
// ============================================================================

export interface ResponseOutcome {
  statusCode: number;
  /** Full body, only present when a pattern check needed it */
  body?: Uint8Array;
}

export type PatternMode = 'required' | 'forbidden';

export interface ActivePattern {
  mode: PatternMode;
  pattern: string;
}

export type StatusClassification =
  | { kind: 'verdict'; verdict: Verdict }
  | { kind: 'verify-body' };

// ============================================================================
// Pre-flight
// ============================================================================

/**
 * Configuration errors that must stop the check before any request is sent
 */
export function preflight(config: CheckConfig): Verdict | undefined {
  if (config.url === '') {
    return unknown('no URL specified');
  }

  if (config.requiredPattern && config.forbiddenPattern) {
    return unknown('--query and --negquery can not be used simultaneously');
  }

  return undefined;
}

// ============================================================================
// Status Classification
// ============================================================================

function hasExplicitExpectation(config: CheckConfig): config is CheckConfig & { expectedStatusCode: number } {
  const expected = config.expectedStatusCode;
  return expected !== undefined && expected !== 0 && expected !== STATUS_OK;
}

export function classifyStatus(config: CheckConfig, statusCode: number): StatusClassification {
  // An explicit expectation wins over the default 2xx/3xx ranges
  if (hasExplicitExpectation(config)) {
    if (statusCode === config.expectedStatusCode) {
      return { kind: 'verify-body' };
    }
    return {
      kind: 'verdict',
      verdict: critical(
        `expected HTTP status ${statusLine(config.expectedStatusCode)}, got ${statusLine(statusCode)}`
      ),
    };
  }

  if (isSuccess(statusCode)) {
    return { kind: 'verify-body' };
  }

  if (isRedirect(statusCode)) {
    if (config.redirectAccepted) {
      return { kind: 'verify-body' };
    }
    return {
      kind: 'verdict',
      verdict: warning(`${statusLine(statusCode)}: unexpected redirection`),
    };
  }

  return { kind: 'verdict', verdict: critical(statusLine(statusCode)) };
}

// ============================================================================
// Body Verification
// ============================================================================

export function activePattern(config: CheckConfig): ActivePattern | undefined {
  if (config.requiredPattern) {
    return { mode: 'required', pattern: config.requiredPattern };
  }
  if (config.forbiddenPattern) {
    return { mode: 'forbidden', pattern: config.forbiddenPattern };
  }
  return undefined;
}

/**
 * Whether the response body has to be read to reach a verdict
 */
export function needsBody(config: CheckConfig, statusCode: number): boolean {
  return (
    activePattern(config) !== undefined &&
    classifyStatus(config, statusCode).kind === 'verify-body'
  );
}

function containsBytes(body: Uint8Array, pattern: string): boolean {
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength).includes(pattern, 0, 'utf8');
}

export function verifyBody(config: CheckConfig, statusCode: number, body?: Uint8Array): Verdict {
  const active = activePattern(config);
  if (!active) {
    return ok(statusLine(statusCode));
  }

  const bytes = body ?? new Uint8Array(0);
  const { mode, pattern } = active;

  if (containsBytes(bytes, pattern)) {
    const message = `${statusLine(statusCode)} found /${pattern}/ in ${bytes.byteLength} bytes`;
    return mode === 'required' ? ok(message) : critical(message);
  }

  const message = `did not find /${pattern}/ in ${bytes.byteLength} bytes`;
  return mode === 'required' ? critical(message) : ok(message);
}

// ============================================================================
// Evaluation
// ============================================================================

export function evaluate(config: CheckConfig, outcome: ResponseOutcome): Verdict {
  const classification = classifyStatus(config, outcome.statusCode);
  if (classification.kind === 'verdict') {
    return classification.verdict;
  }
  return verifyBody(config, outcome.statusCode, outcome.body);
}
