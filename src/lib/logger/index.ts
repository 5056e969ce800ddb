export {
  createComponentLogger,
  buildPayload,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogContext,
  type LogSeverity,
  type StructuredLog,
} from './logger.js';
