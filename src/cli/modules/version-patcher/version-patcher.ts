/**
 * Stamps a version into the `<AssemblyVersion>` line of a project file.
 *
 * Purely textual: the file is never parsed as XML, and every line other than
 * the rewritten one is written back byte for byte.
 */

import { ASSEMBLY_VERSION_CLOSE_TAG, ASSEMBLY_VERSION_OPEN_TAG } from '../../constants/paths.ts';
import type { ParsedVersion } from '../../input/validation.ts';
import { type Logger, silentLogger } from '../../observability/logger.ts';
import { type FileSystemDeps, readLines, writeLines } from '../file-system/file-system.ts';
import type { PatchResult } from '../types.ts';

export interface PatchOptions extends Pick<FileSystemDeps, 'readFileFn' | 'writeFileFn'> {
  readonly logger?: Pick<Logger, 'debug' | 'warn'>;
}

/**
 * Index of the last line containing the opening tag, or -1. When the tag
 * appears on several lines the last one wins.
 */
export function findAssemblyVersionLine(lines: readonly string[]): number {
  for (let index = lines.length - 1; index >= 0; index--) {
    if (lines[index]?.includes(ASSEMBLY_VERSION_OPEN_TAG)) {
      return index;
    }
  }
  return -1;
}

/**
 * Everything before the first `<` of the line.
 */
export function leadingIndent(line: string): string {
  const tagStart = line.indexOf('<');
  return tagStart === -1 ? '' : line.slice(0, tagStart);
}

/**
 * The line's own terminator, or `\n` for an unterminated line.
 */
export function lineTerminator(line: string): string {
  if (line.endsWith('\r\n')) {
    return '\r\n';
  }
  return '\n';
}

/**
 * Build the replacement for `line`, keeping its indentation and terminator.
 */
export function buildAssemblyVersionLine(line: string, version: string): string {
  return `${leadingIndent(line)}${ASSEMBLY_VERSION_OPEN_TAG}${version}${ASSEMBLY_VERSION_CLOSE_TAG}${lineTerminator(line)}`;
}

/**
 * Replace the AssemblyVersion line of `filePath` with one carrying `version`.
 *
 * A file without the tag is left untouched and reported as `tag-missing`
 * with a warning; the caller carries on with the next file.
 *
 * @throws {FileSystemError} when the file cannot be read or written.
 */
export async function patchAssemblyVersion(
  filePath: string,
  version: ParsedVersion,
  options: PatchOptions = {},
): Promise<PatchResult> {
  const { logger = silentLogger, readFileFn, writeFileFn } = options;
  const lines = await readLines(filePath, readFileFn ? { readFileFn } : {});
  const lineIndex = findAssemblyVersionLine(lines);
  const previousLine = lines[lineIndex];

  if (previousLine === undefined) {
    logger.warn(`Warning: could not find AssemblyVersion line in ${filePath}`, { filePath });
    return { filePath, status: 'tag-missing' };
  }

  const updatedLine = buildAssemblyVersionLine(previousLine, version.text);
  // Replaced by position: an identical earlier line stays where it is.
  lines[lineIndex] = updatedLine;
  await writeLines(filePath, lines, writeFileFn ? { writeFileFn } : {});

  logger.debug(`Updated ${filePath}:${lineIndex + 1} to ${updatedLine.trim()}`, {
    filePath,
    previousVersionLine: previousLine.trim(),
  });

  return { filePath, status: 'updated', lineIndex, previousLine, updatedLine };
}
