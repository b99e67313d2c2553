/**
 * Color Selector Build Prep - CLI
 *
 * Role:
 *   Prepare the Color Selector repository for a build: remove stale build
 *   output and stamp a version into each project file.
 *
 * Principles:
 *   - Fail fast on invalid input, before touching the disk
 *   - Deterministic output and exit codes
 *   - No implicit behaviour
 */

// Config re-exports
export {
  DEFAULT_PROJECT_LAYOUT,
  DEFAULT_REPOSITORY_ROOT,
  PROJECT_REGISTRY,
  type ProjectConfig,
  type ProjectLayout,
  type ResolvedProject,
  resolveProjectPaths,
} from '../config/index.ts';
// Execution re-exports
export {
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type RetryPolicy,
} from '../execution/index.ts';
// Input handling re-exports
export {
  type CLIArgs,
  ensureRepositoryRoot,
  type ParsedVersion,
  parseCliArgs,
  validateVersionString,
} from '../input/index.ts';
// Module re-exports
export {
  cleanProjectDirectories,
  patchAssemblyVersion,
  type PatchResult,
  type RunSummary,
} from '../modules/index.ts';
// Observability re-exports
export { createLogger, type Logger, type LoggerOptions } from '../observability/index.ts';
// Core exports
export { type EntrypointDeps, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp, showUsage } from './help/formatter.ts';
export { showVersion } from './help/help.ts';
export { main } from './main.ts';
