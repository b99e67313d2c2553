/**
 * Color Selector Build Prep - CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors).
 *
 * Responsibilities:
 *   - Set up EPIPE error handling
 *   - Stop the run on SIGINT/SIGTERM and exit with their conventional codes
 *   - Turn the main result into `process.exitCode`
 *   - Enable module self-execution detection
 */

import { pathToFileURL } from 'node:url';
import { AppError, formatErrorMessage, isAppError } from '../../../errors/errors.ts';
import type { MainResult } from '../../execution/execution.ts';
import { main } from '../main.ts';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/** 128 + signal number. */
export const SIGNAL_EXIT_CODES: Readonly<Record<ShutdownSignal, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface EntrypointDeps {
  /** Receives a signal that is aborted on SIGINT/SIGTERM. */
  readonly mainFn?: (signal: AbortSignal) => Promise<MainResult>;
  readonly console?: Pick<Console, 'error'>;
  /** Extra shutdown handler invoked on SIGINT/SIGTERM */
  readonly onSignal?: (signal: ShutdownSignal) => Promise<void> | void;
}

/**
 * Ignore EPIPE raised when stdout or stderr is piped into a process that
 * exits early; rethrow everything else.
 */
export function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

/**
 * Install `handleBrokenPipe` on stdout and stderr.
 *
 * @returns Cleanup function that removes the listeners.
 */
export function setupBrokenPipeHandlers(): () => void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);

  return () => {
    process.stdout.off('error', handleBrokenPipe);
    process.stderr.off('error', handleBrokenPipe);
  };
}

export interface SignalHandlers {
  /** First signal received while installed, if any. */
  readonly received: () => ShutdownSignal | undefined;
  readonly dispose: () => void;
}

/**
 * Register SIGINT/SIGTERM handlers. Only the first signal is acted on.
 */
export function setupSignalHandlers(
  deps: Pick<EntrypointDeps, 'onSignal'>,
  errorConsole: Pick<Console, 'error'>,
): SignalHandlers {
  let received: ShutdownSignal | undefined;

  const reportHandlerFailure = (error: unknown): void => {
    errorConsole.error(`WARN: signal handler failed: ${formatErrorMessage(error)}`);
  };

  const createHandler = (signal: ShutdownSignal) => () => {
    if (received !== undefined) {
      return;
    }
    received = signal;
    process.exitCode = SIGNAL_EXIT_CODES[signal];

    if (deps.onSignal) {
      try {
        Promise.resolve(deps.onSignal(signal)).catch(reportHandlerFailure);
      } catch (error) {
        reportHandlerFailure(error);
      }
    }
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return {
    received: () => received,
    dispose: () => {
      process.off('SIGINT', sigintHandler);
      process.off('SIGTERM', sigtermHandler);
    },
  };
}

/**
 * Run the CLI with broken-pipe and signal handling, and set the process
 * exit code from the result. A signal aborts the run and its exit code wins
 * over the result's.
 */
export async function runEntrypoint(deps: EntrypointDeps = {}): Promise<void> {
  const {
    mainFn = (signal: AbortSignal) => main({ signal }),
    console: errorConsole = console,
    onSignal,
  } = deps;

  const removeBrokenPipeHandlers = setupBrokenPipeHandlers();
  const controller = new AbortController();
  const signals = setupSignalHandlers(
    {
      onSignal: (signal) => {
        controller.abort(signal);
        return onSignal?.(signal);
      },
    },
    errorConsole,
  );

  try {
    const result = await mainFn(controller.signal);
    if (signals.received() === undefined) {
      process.exitCode = result.exitCode;
    }
  } catch (error) {
    const wrapped = isAppError(error)
      ? error
      : new AppError('UNEXPECTED_ERROR', error instanceof Error ? error.message : String(error), {
          cause: error,
        });
    errorConsole.error(`❌ Fatal error: ${formatErrorMessage(wrapped)}`);
    if (signals.received() === undefined) {
      process.exitCode = 1;
    }
  } finally {
    signals.dispose();
    removeBrokenPipeHandlers();
  }
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  void runEntrypoint();
}
