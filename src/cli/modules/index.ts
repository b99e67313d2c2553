/**
 * Preparation modules: file system access, directory cleaning, version
 * patching and run summaries.
 */

export {
  cleanProjectDirectories,
  type CleanOptions,
  listRemovedDirectories,
  runCleanPass,
} from './directory-cleaner/directory-cleaner.ts';
export {
  type FileSystemDeps,
  findMatchingDirectories,
  readLines,
  removeDirectory,
  splitLines,
  writeLines,
} from './file-system/file-system.ts';
export {
  buildRunSummary,
  recordWarnings,
  type WarningRecorder,
} from './run-summary/run-summary.ts';
export type {
  CleanPassResult,
  CleanReport,
  PatchResult,
  PatchStatus,
  RunSummary,
} from './types.ts';
export {
  buildAssemblyVersionLine,
  findAssemblyVersionLine,
  leadingIndent,
  lineTerminator,
  type PatchOptions,
  patchAssemblyVersion,
} from './version-patcher/version-patcher.ts';
