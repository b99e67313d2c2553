/**
 * Color Selector Build Prep - Logging
 *
 * Role:
 *   Console logging for a single preparation run.
 *
 * Guarantees:
 *   - Human mode prints messages exactly as given
 *   - Structured mode prints one JSON object per line
 *   - Debug output only appears in verbose mode
 *
 * Non-goals:
 *   - No log files
 *   - No buffering
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Readonly<Record<string, unknown>>;

interface StructuredPayload {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/** Console methods the logger writes to. */
export type LogConsole = Pick<Console, 'log' | 'warn' | 'error'>;

export interface LoggerOptions {
  readonly console?: LogConsole;
  readonly verbose?: boolean;
  readonly structured?: boolean;
  /** Clock used for structured timestamps. */
  readonly nowFn?: () => Date;
}

export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Serialize a log record as a single JSON line.
 */
function formatStructured(
  level: LogLevel,
  message: string,
  timestamp: Date,
  context?: LogContext,
): string {
  const payload: StructuredPayload = {
    timestamp: timestamp.toISOString(),
    level,
    message,
  };

  if (context !== undefined && Object.keys(context).length > 0) {
    payload.context = context;
  }

  return JSON.stringify(payload);
}

/**
 * Pick the console method for a level; debug shares stdout with info.
 */
function sinkFor(target: LogConsole, level: LogLevel): (line: string) => void {
  switch (level) {
    case 'warn':
      return (line) => target.warn(line);
    case 'error':
      return (line) => target.error(line);
    default:
      return (line) => target.log(line);
  }
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Create a logger bound to a console.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    console: target = console,
    verbose = false,
    structured = false,
    nowFn = () => new Date(),
  } = options;

  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (level === 'debug' && !verbose) {
      return;
    }
    const line = structured ? formatStructured(level, message, nowFn(), context) : message;
    sinkFor(target, level)(line);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

/**
 * Logger that discards everything. Default for modules called without one.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
