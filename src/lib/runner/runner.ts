/**
 * Check Runner
 *
 * Runs one check end to end: pre-flight validation, the single request,
 * and evaluation. The body is only read when a pattern has to be verified
 * on a response whose status already matched; otherwise it is discarded.
 */

import type { CheckConfig } from '../config/index.js';
import { evaluate, needsBody, preflight, unknown, type Verdict } from '../checks/index.js';
import { HttpProbe, describeError, type FetchLike } from '../http/index.js';
import { silentLogger, type Logger } from '../logger/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckRunnerOptions {
  /** Injected in tests; defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

// ============================================================================
// Check Runner
// ============================================================================

export class CheckRunner {
  private fetchImpl?: FetchLike;
  private logger: Logger;

  constructor(options: CheckRunnerOptions = {}) {
    this.fetchImpl = options.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the check. Every failure of the check itself resolves as a verdict;
   * only an error thrown by the logger while reporting can reject.
   */
  async run(config: CheckConfig): Promise<Verdict> {
    const startTime = Date.now();
    let verdict: Verdict;

    try {
      verdict = await this.execute(config);
    } catch (error) {
      this.logger.error('check.failed', { url: config.url, error });
      verdict = unknown(`unexpected error: ${describeError(error)}`);
    }

    this.logger.info('check.completed', {
      url: config.url,
      level: verdict.level,
      durationMs: Date.now() - startTime,
    });

    return verdict;
  }

  private async execute(config: CheckConfig): Promise<Verdict> {
    const invalid = preflight(config);
    if (invalid) {
      return invalid;
    }

    this.logger.info('check.started', {
      url: config.url,
      timeoutSeconds: config.timeoutSeconds,
    });

    const probe = new HttpProbe({
      timeoutSeconds: config.timeoutSeconds,
      fetch: this.fetchImpl,
      logger: this.logger,
    });

    const result = await probe.get(config.url);
    if (!result.ok) {
      return result.verdict;
    }

    const { response } = result;
    try {
      this.logger.info('response.received', { statusCode: response.statusCode });

      if (!needsBody(config, response.statusCode)) {
        return evaluate(config, { statusCode: response.statusCode });
      }

      const body = await response.readBody();
      if (!body.ok) {
        return body.verdict;
      }

      return evaluate(config, { statusCode: response.statusCode, body: body.body });
    } finally {
      // No-op once the body was read
      await response.discard();
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCheckRunner(options?: CheckRunnerOptions): CheckRunner {
  return new CheckRunner(options);
}

/**
 * Quick run function for simple use cases
 */
export function runCheck(config: CheckConfig, options?: CheckRunnerOptions): Promise<Verdict> {
  return new CheckRunner(options).run(config);
}
