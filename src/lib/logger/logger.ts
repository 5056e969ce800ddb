/**
 * Structured Logger
 *
 * One JSON object per line on stderr. stdout is reserved for the check's
 * report line, which monitoring systems parse.
 */

export type LogSeverity = 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export type StructuredLog = LogContext & {
  component: string;
  event: string;
  severity: LogSeverity;
};

export interface Logger {
  info: (event: string, context?: LogContext) => void;
  warn: (event: string, context?: LogContext) => void;
  error: (event: string, context?: LogContext) => void;
}

export interface LoggerOptions {
  /** Disabled loggers drop every entry (default: true) */
  enabled?: boolean;
  /** Line sink (default: console.error) */
  write?: (line: string) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonSafe(value: unknown): unknown {
  try {
    return JSON.parse(
      JSON.stringify(value, (_key, current: unknown) => {
        if (typeof current === 'bigint') {
          return current.toString();
        }
        if (current instanceof Error) {
          return {
            name: current.name,
            message: current.message,
            stack: current.stack,
          };
        }
        return current;
      })
    );
  } catch {
    return String(value);
  }
}

export function buildPayload(
  component: string,
  event: string,
  severity: LogSeverity,
  context?: LogContext
): StructuredLog {
  const safeContext = toJsonSafe(context ?? {});
  const payloadBase = { component, event, severity };
  if (!isRecord(safeContext)) {
    return { ...payloadBase, details: safeContext };
  }
  return { ...safeContext, ...payloadBase };
}

export function createComponentLogger(component: string, options: LoggerOptions = {}): Logger {
  const enabled = options.enabled ?? true;
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (severity: LogSeverity, event: string, context?: LogContext) => {
    if (!enabled) return;
    write(JSON.stringify(buildPayload(component, event, severity, context)));
  };

  return {
    info(event, context) {
      emit('info', event, context);
    },
    warn(event, context) {
      emit('warn', event, context);
    },
    error(event, context) {
      emit('error', event, context);
    },
  };
}

export const silentLogger: Logger = createComponentLogger('silent', { enabled: false });
