/**
 * HTTP Probe
 *
 * Sends the check's single GET request. Redirects are never followed: the
 * first response, 3xx included, is handed back as-is. A deadline of
 * `timeoutSeconds` covers the request and, if it happens, the body read.
 *
 * Failures never escape as exceptions; they come back as CRITICAL verdicts.
 */

import { critical, type Verdict } from '../checks/index.js';
import { MAX_TIMEOUT_SECONDS } from '../config/index.js';
import { silentLogger, type Logger } from '../logger/index.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ProbeOptions {
  /** Request deadline in seconds; 0 disables it */
  timeoutSeconds: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

export type BodyResult =
  | { ok: true; body: Uint8Array }
  | { ok: false; verdict: Verdict };

/**
 * A received response whose body has not been touched yet. The body can
 * be read once; discard() releases it unread and is a no-op afterwards.
 */
export interface ProbeResponse {
  statusCode: number;
  readBody(): Promise<BodyResult>;
  discard(): Promise<void>;
}

export type ProbeResult =
  | { ok: true; response: ProbeResponse }
  | { ok: false; verdict: Verdict };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Error text including the cause fetch wraps around network failures
 * ("fetch failed: connect ECONNREFUSED 127.0.0.1:9")
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const cause: unknown = error.cause;
  let causeText = '';
  if (cause instanceof Error) {
    causeText = cause.message;
    if (!causeText && 'code' in cause && typeof cause.code === 'string') {
      causeText = cause.code;
    }
  }

  if (causeText && !error.message.includes(causeText)) {
    return `${error.message}: ${causeText}`;
  }
  return error.message;
}

class Deadline {
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private fired = false;

  constructor(seconds: number) {
    if (seconds > 0) {
      this.timer = setTimeout(() => {
        this.fired = true;
        this.controller.abort();
      }, Math.min(seconds, MAX_TIMEOUT_SECONDS) * 1000);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.fired;
  }

  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

// ============================================================================
// HTTP Probe
// ============================================================================

export class HttpProbe {
  private timeoutSeconds: number;
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(options: ProbeOptions) {
    this.timeoutSeconds = options.timeoutSeconds;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Issue one GET request to the URL
   */
  async get(url: string): Promise<ProbeResult> {
    const deadline = new Deadline(this.timeoutSeconds);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        redirect: 'manual',
        signal: deadline.signal,
      });
    } catch (error) {
      deadline.clear();
      return { ok: false, verdict: this.failure(deadline, `Request error: ${describeError(error)}`) };
    }

    return { ok: true, response: this.wrap(res, deadline) };
  }

  private wrap(res: Response, deadline: Deadline): ProbeResponse {
    let settled = false;

    return {
      statusCode: res.status,

      readBody: async (): Promise<BodyResult> => {
        if (settled) {
          return { ok: false, verdict: critical('response body already consumed') };
        }
        settled = true;

        try {
          const body = new Uint8Array(await res.arrayBuffer());
          return { ok: true, body };
        } catch (error) {
          return { ok: false, verdict: this.failure(deadline, describeError(error)) };
        } finally {
          deadline.clear();
        }
      },

      discard: async (): Promise<void> => {
        if (settled) return;
        settled = true;

        try {
          await res.body?.cancel();
        } catch (error) {
          this.logger.warn('response.discard_failed', { error });
        } finally {
          deadline.clear();
        }
      },
    };
  }

  private failure(deadline: Deadline, message: string): Verdict {
    if (deadline.expired) {
      return critical(`Request exceeded timeout of ${this.timeoutSeconds} seconds`);
    }
    return critical(message);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createHttpProbe(options: ProbeOptions): HttpProbe {
  return new HttpProbe(options);
}
