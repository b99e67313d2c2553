/**
 * Color Selector Build Prep - Main Execution
 *
 * Role:
 *   Orchestrate one preparation run.
 *
 * Responsibilities:
 *   - Print usage when no version string is given
 *   - Validate the version string, then the repository root
 *   - Clean build output, then stamp the version into each project file
 *   - Map validation and file-system failures to an exit code
 *
 * Nothing on disk is touched until both validations pass. An aborted `signal`
 * stops the run at the next step boundary.
 */

import type { Dirent } from 'node:fs';
import {
  assertValidLayout,
  DEFAULT_PROJECT_LAYOUT,
  DEFAULT_REPOSITORY_ROOT,
  type ProjectLayout,
  resolveProjectPaths,
} from '../config/index.ts';
import { showUsage } from '../core/help/formatter.ts';
import { formatErrorMessage, isAppError, isCliError } from '../../errors/errors.ts';
import type { CLIArgs } from '../input/args.ts';
import { ensureRepositoryRoot, validateVersionString } from '../input/validation.ts';
import { cleanProjectDirectories } from '../modules/directory-cleaner/directory-cleaner.ts';
import { buildRunSummary, recordWarnings } from '../modules/run-summary/run-summary.ts';
import type { PatchResult, RunSummary } from '../modules/types.ts';
import { patchAssemblyVersion } from '../modules/version-patcher/version-patcher.ts';
import { createLogger, type LogConsole } from '../observability/logger.ts';
import { throwIfInterrupted } from './retry.ts';

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Allows callers (tests or alternative entrypoints) to point the run at
 * another repository, shorten the retry wait, or replace file-system calls.
 */
export interface MainDeps {
  readonly argv?: readonly string[];
  readonly repositoryRoot?: string;
  readonly layout?: ProjectLayout;
  readonly console?: LogConsole;
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly readdirFn?: (dir: string) => Promise<Dirent[]>;
  readonly rmFn?: (
    dirPath: string,
    options: { readonly recursive: boolean; readonly force: boolean },
  ) => Promise<void>;
  readonly readFileFn?: (filePath: string) => Promise<string>;
  readonly writeFileFn?: (filePath: string, data: string) => Promise<void>;
  /** Aborted by the entrypoint on SIGINT/SIGTERM. */
  readonly signal?: AbortSignal;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly summary?: RunSummary;
}

/**
 * Execute a preparation run with parsed args and optional dependency overrides.
 */
export async function executeWithArgs(args: CLIArgs, deps: MainDeps = {}): Promise<MainResult> {
  const {
    repositoryRoot = DEFAULT_REPOSITORY_ROOT,
    layout = DEFAULT_PROJECT_LAYOUT,
    console: injectedConsole = console,
    sleepFn,
    readdirFn,
    rmFn,
    readFileFn,
    writeFileFn,
    signal,
  } = deps;

  const recorder = recordWarnings(
    createLogger({
      console: injectedConsole,
      verbose: args.verbose,
      structured: args.structuredLogs,
    }),
  );
  const { logger } = recorder;

  if (args.versionString === undefined) {
    injectedConsole.log(showUsage());
    return { exitCode: 0 };
  }

  try {
    const version = validateVersionString(args.versionString);
    const root = ensureRepositoryRoot(repositoryRoot, layout.repositoryDirName);
    assertValidLayout(layout);
    const projects = resolveProjectPaths(root, layout);

    logger.debug(`Repository root: ${root}`);
    logger.debug(`Projects: ${projects.map((project) => project.id).join(', ')}`);
    if (args.ignoredArguments !== undefined) {
      logger.debug(`Ignoring extra arguments: ${args.ignoredArguments.join(' ')}`);
    }

    logger.info(`Cleaning ${layout.cleanTargets.join(' and ')} directories ...`);
    const cleanReport = await cleanProjectDirectories(projects, layout.cleanTargets, layout.retry, {
      logger,
      ...(sleepFn ? { sleepFn } : {}),
      ...(readdirFn ? { readdirFn } : {}),
      ...(rmFn ? { rmFn } : {}),
      ...(signal ? { signal } : {}),
    });
    logger.info('done.');

    logger.info(`Setting version ${version.text} in project files ...`);
    const patchResults: PatchResult[] = [];
    for (const project of projects) {
      throwIfInterrupted(signal);
      patchResults.push(
        await patchAssemblyVersion(project.configFile, version, {
          logger,
          ...(readFileFn ? { readFileFn } : {}),
          ...(writeFileFn ? { writeFileFn } : {}),
        }),
      );
    }
    logger.info('done.');

    return {
      exitCode: 0,
      summary: buildRunSummary(version.text, cleanReport, patchResults, recorder.warnings()),
    };
  } catch (err) {
    if (isAppError(err) && err.code === 'RUN_INTERRUPTED') {
      logger.error(`Aborted: ${err.message}`);
    } else if (isCliError(err)) {
      logger.error(`Error: ${err.message}`, { code: err.code });
    } else {
      logger.error(`❌ Fatal error: ${formatErrorMessage(err)}`);
    }
    return { exitCode: 1 };
  }
}
