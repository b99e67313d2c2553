/**
 * Removes stale build output (`bin`, `obj`, ...) from each project folder so
 * the next build starts clean.
 *
 * Responsibilities:
 *   - One clean pass: find matching directories and delete them
 *   - Repeat the pass per the retry policy
 *
 * Non-responsibilities:
 *   - No waiting on, or detection of, the process holding a lock
 */

import type { ResolvedProject } from '../../config/project-layout.ts';
import { formatErrorMessage } from '../../../errors/errors.ts';
import { type RetryPolicy, repeatPasses } from '../../execution/retry.ts';
import { type Logger, silentLogger } from '../../observability/logger.ts';
import {
  type FileSystemDeps,
  findMatchingDirectories,
  removeDirectory,
} from '../file-system/file-system.ts';
import type { CleanPassResult, CleanReport } from '../types.ts';

export interface CleanOptions extends Pick<FileSystemDeps, 'readdirFn' | 'rmFn'> {
  readonly logger?: Pick<Logger, 'debug' | 'warn'>;
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly signal?: AbortSignal;
}

/**
 * Sweep every project folder once, deleting child directories that match
 * `targets`. The first failure ends the pass.
 */
export async function runCleanPass(
  projects: readonly ResolvedProject[],
  targets: readonly string[],
  pass: number,
  options: CleanOptions = {},
): Promise<CleanPassResult> {
  const { logger = silentLogger, readdirFn, rmFn } = options;
  const removed: string[] = [];

  for (const project of projects) {
    const found = await findMatchingDirectories(
      project.rootDir,
      targets,
      readdirFn ? { readdirFn } : {},
    );

    for (const dir of found) {
      if (await removeDirectory(dir, rmFn ? { rmFn } : {})) {
        removed.push(dir);
        logger.debug(`Removed ${dir}`, { project: project.id, pass });
      }
    }
  }

  return { pass, removed };
}

/**
 * Run the clean pass as many times as `policy` asks.
 *
 * @throws {FileSystemError} when the final pass fails.
 */
export async function cleanProjectDirectories(
  projects: readonly ResolvedProject[],
  targets: readonly string[],
  policy: RetryPolicy,
  options: CleanOptions = {},
): Promise<CleanReport> {
  const { logger = silentLogger, sleepFn, signal } = options;
  let retriedFailures = 0;

  const passes = await repeatPasses(
    (pass) => runCleanPass(projects, targets, pass, options),
    policy,
    {
      ...(sleepFn ? { sleepFn } : {}),
      ...(signal ? { signal } : {}),
      onWait: (delayMs, nextPass) => {
        logger.debug(`Waiting ${delayMs} ms before clean pass ${nextPass}`);
      },
      onPassFailed: ({ pass, error }) => {
        retriedFailures++;
        logger.warn(`Warning: clean pass ${pass} failed, retrying: ${formatErrorMessage(error)}`);
      },
    },
  );

  return { passes, retriedFailures };
}

/**
 * Every directory removed across all passes, in removal order.
 */
export function listRemovedDirectories(report: CleanReport): string[] {
  return report.passes.flatMap((result) => result.removed);
}
