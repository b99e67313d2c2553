/**
 * Observability: console logging
 */

export {
  createLogger,
  type LogConsole,
  type LogContext,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  silentLogger,
} from './logger.ts';
