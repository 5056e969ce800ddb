/**
 * Verdicts
 *
 * The single result of one check invocation, and the conventions used to
 * report it to a monitoring system (exit codes and output lines).
 */

// ============================================================================
// Types
// ============================================================================

export type CheckLevel = 'ok' | 'warning' | 'critical' | 'unknown';

export interface Verdict {
  level: CheckLevel;
  message: string;
}

export type OutputMode = 'text' | 'json';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES: Readonly<Record<CheckLevel, number>> = {
  ok: 0,
  warning: 1,
  critical: 2,
  unknown: 3,
};

// ============================================================================
// Helpers
// ============================================================================

export const ok = (message: string): Verdict => ({ level: 'ok', message });
export const warning = (message: string): Verdict => ({ level: 'warning', message });
export const critical = (message: string): Verdict => ({ level: 'critical', message });
export const unknown = (message: string): Verdict => ({ level: 'unknown', message });

export function toExitCode(level: CheckLevel): number {
  return EXIT_CODES[level];
}

/**
 * Render a verdict as the single line printed on stdout
 */
export function formatVerdict(verdict: Verdict, mode: OutputMode = 'text'): string {
  if (mode === 'json') {
    return JSON.stringify({
      status: verdict.level,
      exitCode: toExitCode(verdict.level),
      message: verdict.message,
    });
  }
  return `HTTP ${verdict.level.toUpperCase()}: ${verdict.message}`;
}
