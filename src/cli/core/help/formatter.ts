/**
 * Color Selector Build Prep - Help Text Formatter
 *
 * Role:
 *   Format usage and help information.
 *
 * Responsibilities:
 *   - Generate the help text with the configured project folders
 *   - Generate the one-line usage shown when no version is given
 *   - Escape/sanitize registry values for display
 */

import { DEFAULT_PROJECT_LAYOUT, type ProjectLayout } from '../../config/index.ts';
import { CLI_NAME } from '../../constants/paths.ts';

/**
 * Sanitize a token for inclusion in help output.
 *
 * Removes non-printable or non-ASCII characters so registry values cannot
 * inject control characters or terminal escape sequences.
 */
export const escapeHelpToken = (value: string): string =>
  // Keep only printable ASCII characters (remove control chars and emoji)
  value.replaceAll(/[^\u0020-\u007E]/g, '');

/**
 * Static help message template. `[PROJECTS]`, `[TARGETS]` and `[ROOT]` are
 * filled in by `showHelp()`.
 */
const HELP_MESSAGE = `
Color Selector Build Preparation

USAGE:
  ${CLI_NAME} [OPTIONS] <major.minor.revision>

Removes stale build output and stamps the version into each project's
AssemblyVersion line. Must run from the "[ROOT]" repository root.

OPTIONS:
  --verbose             Log every removed directory and patched line (alias: --debug)
  --structured-logs     Emit JSON log lines
  -h, --help            Show this help message
  -v, --version         Show version number

PROJECTS:
  [PROJECTS]

CLEANED FOLDERS:
  [TARGETS]

EXAMPLES:
  ${CLI_NAME} 2.1.3
  ${CLI_NAME} --verbose 2.1.3
`;

/**
 * One-line usage printed when no version string was supplied.
 */
export function showUsage(): string {
  return `Usage: ${CLI_NAME} [OPTIONS] <major.minor.revision>`;
}

/**
 * Build the help message from the project layout.
 */
export function showHelp(layout: ProjectLayout = DEFAULT_PROJECT_LAYOUT): string {
  const projects = layout.projects
    .map((project) => escapeHelpToken(`${project.directory}/${project.configFile}`))
    .join('\n  ');
  const targets = layout.cleanTargets.map((target) => escapeHelpToken(target)).join(', ');

  return HELP_MESSAGE.replace('[ROOT]', escapeHelpToken(layout.repositoryDirName))
    .replace('[PROJECTS]', projects)
    .replace('[TARGETS]', targets);
}
