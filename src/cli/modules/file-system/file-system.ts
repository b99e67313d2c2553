/**
 * File system utilities for the cleaner and the version patcher.
 *
 * Every helper reports failures as `FileSystemError` with the path and the
 * original error attached, except "already gone" on removal, which counts as
 * success.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import picomatch from 'picomatch';

import { FileSystemError, getErrnoCode } from '../../../errors/errors.ts';

/**
 * Filesystem functions the modules call, overridable in tests.
 */
export interface FileSystemDeps {
  readonly readdirFn?: (dir: string) => Promise<Dirent[]>;
  readonly rmFn?: (
    dirPath: string,
    options: { readonly recursive: boolean; readonly force: boolean },
  ) => Promise<void>;
  readonly readFileFn?: (filePath: string) => Promise<string>;
  readonly writeFileFn?: (filePath: string, data: string) => Promise<void>;
  /** Match directory names ignoring case; defaults to on for Windows. */
  readonly caseInsensitive?: boolean;
}

const defaultReaddir = (dir: string): Promise<Dirent[]> => readdir(dir, { withFileTypes: true });
const defaultReadFile = (filePath: string): Promise<string> => readFile(filePath, 'utf8');
const defaultWriteFile = (filePath: string, data: string): Promise<void> =>
  writeFile(filePath, data, 'utf8');

const matcherCache = new Map<string, (input: string) => boolean>();

/**
 * Compile (and cache) picomatch matchers for the provided name patterns.
 */
function getMatchers(
  patterns: readonly string[],
  nocase: boolean,
): Array<(input: string) => boolean> {
  return patterns.map((pattern) => {
    const key = `${nocase ? 'i' : 's'}:${pattern}`;
    const cached = matcherCache.get(key);
    if (cached) {
      return cached;
    }
    const compiled = picomatch(pattern, { dot: true, nocase });
    matcherCache.set(key, compiled);
    return compiled;
  });
}

/**
 * List the immediate child directories of `dir` whose names match one of
 * `patterns`, in pattern order. A missing `dir` yields an empty list.
 *
 * @throws {FileSystemError} when `dir` exists but cannot be listed.
 */
export async function findMatchingDirectories(
  dir: string,
  patterns: readonly string[],
  deps: Pick<FileSystemDeps, 'readdirFn' | 'caseInsensitive'> = {},
): Promise<string[]> {
  const { readdirFn = defaultReaddir, caseInsensitive = process.platform === 'win32' } = deps;

  let entries: Dirent[];
  try {
    entries = await readdirFn(dir);
  } catch (error) {
    const errno = getErrnoCode(error);
    if (errno === 'ENOENT' || errno === 'ENOTDIR') {
      return [];
    }
    throw new FileSystemError('FS_LIST_FAILED', `Failed to list ${dir}`, {
      cause: error,
      details: { filePath: dir, operation: 'list', ...(errno === undefined ? {} : { errno }) },
    });
  }

  const directories = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  const matched: string[] = [];

  for (const matcher of getMatchers(patterns, caseInsensitive)) {
    for (const name of directories) {
      const fullPath = path.join(dir, name);
      if (matcher(name) && !matched.includes(fullPath)) {
        matched.push(fullPath);
      }
    }
  }

  return matched;
}

/**
 * Recursively delete a directory. Errors are not ignored, except a directory
 * that vanished since it was listed.
 *
 * @returns `true` when this call removed the directory, `false` when it was
 * already gone.
 * @throws {FileSystemError} when the directory exists but cannot be removed.
 */
export async function removeDirectory(
  dirPath: string,
  deps: Pick<FileSystemDeps, 'rmFn'> = {},
): Promise<boolean> {
  const { rmFn = rm } = deps;

  try {
    await rmFn(dirPath, { recursive: true, force: false });
    return true;
  } catch (error) {
    const errno = getErrnoCode(error);
    if (errno === 'ENOENT') {
      return false;
    }
    throw new FileSystemError('FS_REMOVE_FAILED', `Failed to remove ${dirPath}`, {
      cause: error,
      details: {
        filePath: dirPath,
        operation: 'remove',
        ...(errno === undefined ? {} : { errno }),
      },
    });
  }
}

/**
 * Split text into lines, each keeping its own terminator. An unterminated
 * final line is kept as-is; empty text yields no lines.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Read a whole text file as lines with their terminators.
 *
 * @throws {FileSystemError} when the file cannot be read.
 */
export async function readLines(
  filePath: string,
  deps: Pick<FileSystemDeps, 'readFileFn'> = {},
): Promise<string[]> {
  const { readFileFn = defaultReadFile } = deps;

  try {
    return splitLines(await readFileFn(filePath));
  } catch (error) {
    const errno = getErrnoCode(error);
    throw new FileSystemError('FS_READ_FAILED', `Failed to read ${filePath}`, {
      cause: error,
      details: { filePath, operation: 'read', ...(errno === undefined ? {} : { errno }) },
    });
  }
}

/**
 * Overwrite a file with the given lines, written exactly as they are.
 *
 * @throws {FileSystemError} when the file cannot be written.
 */
export async function writeLines(
  filePath: string,
  lines: readonly string[],
  deps: Pick<FileSystemDeps, 'writeFileFn'> = {},
): Promise<void> {
  const { writeFileFn = defaultWriteFile } = deps;

  try {
    await writeFileFn(filePath, lines.join(''));
  } catch (error) {
    const errno = getErrnoCode(error);
    throw new FileSystemError('FS_WRITE_FAILED', `Failed to write ${filePath}`, {
      cause: error,
      details: { filePath, operation: 'write', ...(errno === undefined ? {} : { errno }) },
    });
  }
}
