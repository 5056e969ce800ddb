/**
 * check-http - single-request HTTP health check
 *
 * Fetch a URL once, judge the response against the expected status code,
 * redirect policy and body pattern, and report OK/WARNING/CRITICAL/UNKNOWN.
 */

// Verdicts and response evaluation
export * from './lib/checks/index.js';

// Configuration and flags
export * from './lib/config/index.js';

// The single request
export * from './lib/http/index.js';

// Check execution and CLI
export * from './lib/runner/index.js';

// Structured logging
export * from './lib/logger/index.js';

// Version
export const VERSION = '0.1.0';
