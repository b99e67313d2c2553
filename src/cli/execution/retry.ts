/**
 * Color Selector Build Prep - Repeated Pass Policy
 *
 * Role:
 *   Run an idempotent pass a fixed number of times with waits in between.
 *
 * The IDE can hold a lock on build output, or regenerate it, for a moment
 * after a build. Every pass runs regardless of whether the previous one
 * succeeded; only a failure in the final pass is fatal.
 */

import { AppError } from '../../errors/errors.ts';

/**
 * How many passes to run and how long to wait between them.
 */
export interface RetryPolicy {
  /** Total number of passes, including the first */
  readonly passes: number;
  /** Wait before the second pass */
  readonly delayMs: number;
  /** Multiplier applied to the wait before each later pass */
  readonly backoffFactor: number;
}

/**
 * A non-final pass that threw; the next pass gets another chance.
 */
export interface PassFailure {
  readonly pass: number;
  readonly error: unknown;
}

export interface RepeatPassesOptions {
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly onPassFailed?: (failure: PassFailure) => void;
  readonly onWait?: (delayMs: number, nextPass: number) => void;
  /** Checked before each pass, including right after a wait. */
  readonly signal?: AbortSignal;
}

/**
 * Throw `RUN_INTERRUPTED` once `signal` has been aborted. The abort reason,
 * when it is a string, names the signal that stopped the run.
 */
export function throwIfInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted !== true) {
    return;
  }
  const reason: unknown = signal.reason;
  throw new AppError(
    'RUN_INTERRUPTED',
    typeof reason === 'string' ? `Run interrupted by ${reason}` : 'Run interrupted',
  );
}

/**
 * Simple sleep helper used between passes.
 */
function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait in milliseconds before the given 1-based pass.
 */
export function delayBeforePass(policy: RetryPolicy, pass: number): number {
  if (pass <= 1) {
    return 0;
  }
  return policy.delayMs * policy.backoffFactor ** (pass - 2);
}

/**
 * Run `runPass` `policy.passes` times, sleeping between passes.
 *
 * @returns Results of the passes that completed, in order.
 * @throws The final pass's error when it fails.
 */
export async function repeatPasses<T>(
  runPass: (pass: number) => Promise<T>,
  policy: RetryPolicy,
  options: RepeatPassesOptions = {},
): Promise<T[]> {
  const { sleepFn = defaultSleep, onPassFailed, onWait, signal } = options;
  const results: T[] = [];

  for (let pass = 1; pass <= policy.passes; pass++) {
    const delayMs = delayBeforePass(policy, pass);
    if (delayMs > 0) {
      onWait?.(delayMs, pass);
      await sleepFn(delayMs);
    }
    throwIfInterrupted(signal);

    try {
      results.push(await runPass(pass));
    } catch (error) {
      if (pass === policy.passes) {
        throw error;
      }
      onPassFailed?.({ pass, error });
    }
  }

  return results;
}
