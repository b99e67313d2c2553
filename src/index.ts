/**
 * Color Selector Build Prep - Main Entry Point
 *
 * Prepares the Color Selector repository for a release build: removes stale
 * `bin`/`obj` output and stamps a version into each project's
 * AssemblyVersion line.
 */

export {
  DEFAULT_PROJECT_LAYOUT,
  DEFAULT_REPOSITORY_ROOT,
  executeWithArgs,
  main,
  type MainDeps,
  type MainResult,
  type PatchResult,
  type ProjectLayout,
  type RetryPolicy,
  type RunSummary,
  runEntrypoint,
} from './cli/core/index.ts';
export {
  AppError,
  CliError,
  type ErrorCode,
  FileSystemError,
  formatErrorMessage,
  isAppError,
} from './errors/errors.ts';
