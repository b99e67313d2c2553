/**
 * Color Selector Build Prep - Help & Version API
 *
 * Role:
 *   Single entry point for the CLI's informational output.
 */

import { CLI_NAME } from '../../constants/paths.ts';
import { getPackageVersion } from '../version/version.ts';
export { showHelp, showUsage } from './formatter.ts';

/**
 * Return the CLI version string for `--version` output, e.g.
 * `cs-build-prep v1.0.0`.
 */
export function showVersion(): string {
  return `${CLI_NAME} v${getPackageVersion()}`;
}
