/**
 * Color Selector Build Prep - Version Management
 *
 * Role:
 *   Lazy-load and cache the tool's own package version for `--version`.
 *
 * Responsibilities:
 *   - Locate package.json beside the sources via `import.meta.url`
 *   - Read and cache the version on first access
 *   - Fall back to a sentinel when the file is unreadable
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

/** package.json at the package root, four levels above this file. */
export const PACKAGE_JSON_PATH = fileURLToPath(
  new URL(`../../../../${PKG_FILENAME}`, import.meta.url),
);

export interface VersionDeps {
  readonly readFileFn?: (filePath: string) => string;
  readonly onReadError?: (error: unknown) => void;
}

let cachedPkgVersion: string | undefined;

const defaultReadFile = (filePath: string): string => readFileSync(filePath, 'utf8');

const reportReadError = (error: unknown): void => {
  console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
};

/**
 * Pull a non-empty string `version` out of raw package.json text.
 */
export function parsePackageVersion(raw: string): string | undefined {
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
    const { version } = pkg;
    if (typeof version === 'string' && version.length > 0) {
      return version;
    }
  }
  return undefined;
}

/**
 * Resolved package version, read once and cached for the process lifetime.
 *
 * A missing `version` field yields the fallback silently; an unreadable or
 * malformed file yields the fallback and is reported through `onReadError`.
 */
export function getPackageVersion(deps: VersionDeps = {}): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }

  const { readFileFn = defaultReadFile, onReadError = reportReadError } = deps;
  try {
    cachedPkgVersion = parsePackageVersion(readFileFn(PACKAGE_JSON_PATH)) ?? PKG_VERSION_FALLBACK;
  } catch (error) {
    onReadError(error);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

/**
 * Test-only helpers that reset module state without reloading the module.
 */
export const __test__ = {
  resetCache: (): void => {
    cachedPkgVersion = undefined;
  },
};
