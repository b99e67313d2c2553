/**
 * Color Selector Build Prep - Input Validation
 *
 * Role:
 *   Validate the version string and the repository root before anything on
 *   disk is touched.
 *
 * Responsibilities:
 *   - Require exactly three dot-separated version components
 *   - Require the repository root folder to carry the expected name
 */

import path from 'node:path';
import { CliError } from '../../errors/errors.ts';
import { REPOSITORY_DIR_NAME } from '../constants/paths.ts';

/**
 * A version string split into its three components. Components are not
 * checked to be numeric.
 */
export interface ParsedVersion {
  readonly text: string;
  readonly major: string;
  readonly minor: string;
  readonly revision: string;
}

export const VERSION_FORMAT_MESSAGE =
  "Version string must contain major, minor, and revision numbers separated by '.'";

/**
 * Split `input` on `.` and require exactly three components.
 *
 * @throws {CliError} when the component count is not three.
 */
export function validateVersionString(input: string): ParsedVersion {
  const parts = input.split('.');
  const [major, minor, revision] = parts;

  if (parts.length !== 3 || major === undefined || minor === undefined || revision === undefined) {
    throw new CliError('CLI_INVALID_VERSION', VERSION_FORMAT_MESSAGE, {
      details: { input, components: parts.length },
    });
  }

  return { text: input, major, minor, revision };
}

/**
 * Ensure the last segment of `repositoryRoot` is exactly `expectedName`, so
 * that project paths resolved against it point into the right repository.
 *
 * @returns The resolved repository root.
 * @throws {CliError} when the folder name differs.
 */
export function ensureRepositoryRoot(
  repositoryRoot: string,
  expectedName: string = REPOSITORY_DIR_NAME,
): string {
  const resolvedRoot = path.resolve(repositoryRoot);
  const actualName = path.basename(resolvedRoot);

  if (actualName !== expectedName) {
    throw new CliError(
      'CLI_INVALID_PATH',
      `Build preparation must run from the "${expectedName}" repository root (found "${actualName}")`,
      { details: { filePath: resolvedRoot, context: { expectedName, actualName } } },
    );
  }

  return resolvedRoot;
}
