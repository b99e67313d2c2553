/**
 * Result building for a completed preparation run.
 */

import type { Logger } from '../../observability/logger.ts';
import { listRemovedDirectories } from '../directory-cleaner/directory-cleaner.ts';
import type { CleanReport, PatchResult, RunSummary } from '../types.ts';

/**
 * Logger wrapper that keeps every warning it forwards, so the run summary
 * can report them after the fact.
 */
export interface WarningRecorder {
  readonly logger: Logger;
  readonly warnings: () => readonly string[];
}

export function recordWarnings(logger: Logger): WarningRecorder {
  const warnings: string[] = [];

  return {
    logger: {
      ...logger,
      warn: (message, context) => {
        warnings.push(message);
        logger.warn(message, context);
      },
    },
    warnings: () => [...warnings],
  };
}

export function buildRunSummary(
  version: string,
  cleanReport: CleanReport,
  patchResults: readonly PatchResult[],
  warnings: readonly string[],
): RunSummary {
  return {
    version,
    removedDirectories: listRemovedDirectories(cleanReport),
    patchResults,
    warnings,
  };
}
