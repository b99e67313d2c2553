/**
 * Color Selector Build Prep - Shared Test Utilities
 *
 * Role:
 *   Temp file and directory handling for tests that touch the real file
 *   system.
 *
 * Usage:
 *   - createTempDir() for temporary directories
 *   - createTempFile() for a single file inside a fresh directory
 *   - removeTempDir() in afterEach
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Create a temporary directory.
 * Caller must clean up with removeTempDir().
 */
export async function createTempDir(prefix: string = 'tmp-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Write `content` to `<fresh temp dir>/<name>` and return both paths.
 */
export async function createTempFile(
  name: string,
  content: string,
  prefix: string = 'tmp-',
): Promise<{ dir: string; filePath: string }> {
  const dir = await createTempDir(prefix);
  const filePath = path.join(dir, name);
  await writeFile(filePath, content, 'utf8');
  return { dir, filePath };
}

/**
 * Remove a temporary directory and everything under it.
 */
export async function removeTempDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}
