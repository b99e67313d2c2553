/**
 * Shared error hierarchy for consistent error handling.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'CLI_INVALID_VERSION'
  | 'FS_LIST_FAILED'
  | 'FS_REMOVE_FAILED'
  | 'FS_READ_FAILED'
  | 'FS_WRITE_FAILED'
  | 'RUN_INTERRUPTED'
  | 'UNEXPECTED_ERROR';

/**
 * Error details for filesystem operations.
 */
export interface FileSystemErrorDetails {
  /** The file or directory path involved in the error */
  readonly filePath: string;
  /** The operation that failed */
  readonly operation: 'list' | 'remove' | 'read' | 'write';
  /** Underlying errno code, when the platform reported one */
  readonly errno?: string;
}

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base error carrying a stable code and optional structured details.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    // Chain stack traces when cause is an Error for better debugging
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

/**
 * Argument and environment validation failures. Reported without a stack.
 */
export class CliError extends AppError {}

/**
 * Delete, read, or write failures against the repository tree. Always fatal.
 */
export class FileSystemError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to a CliError.
 */
export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Check whether an unknown value has the given property name.
 * Useful before accessing properties on caught errors.
 */
export function hasErrorProperty<T extends string>(
  error: unknown,
  prop: T,
): error is Record<T, unknown> {
  return typeof error === 'object' && error !== null && Reflect.has(error, prop);
}

/**
 * Read the errno code (`ENOENT`, `EBUSY`, ...) off a caught error, if any.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (hasErrorProperty(error, 'code') && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
