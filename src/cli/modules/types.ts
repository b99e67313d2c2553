/**
 * Shared types for the preparation modules.
 */

/** Directories removed by one clean pass, in the order they were removed. */
export interface CleanPassResult {
  /** 1-based pass number. */
  readonly pass: number;
  readonly removed: readonly string[];
}

/** Outcome of every clean pass in a run. */
export interface CleanReport {
  readonly passes: readonly CleanPassResult[];
  /** Passes that failed and were retried by a later pass. */
  readonly retriedFailures: number;
}

/** `updated` when the tag line was rewritten, `tag-missing` when the file was left alone. */
export type PatchStatus = 'updated' | 'tag-missing';

/** Outcome of patching one configuration file. */
export interface PatchResult {
  readonly filePath: string;
  readonly status: PatchStatus;
  /** 0-based index of the rewritten line. */
  readonly lineIndex?: number;
  /** The line as it was before the rewrite, terminator included. */
  readonly previousLine?: string;
  /** The line written in its place, terminator included. */
  readonly updatedLine?: string;
}

/** Everything a completed run did. */
export interface RunSummary {
  readonly version: string;
  readonly removedDirectories: readonly string[];
  readonly patchResults: readonly PatchResult[];
  readonly warnings: readonly string[];
}
