/**
 * @packageDocumentation
 * File path and repository-layout constants used across the CLI.
 *
 * These small constants centralize common literal values so callers do not
 * duplicate strings and tests can assert expected defaults.
 *
 * @remarks
 * Keep this file focused on literal values; path resolution lives in
 * `config/project-layout.ts`.
 */
/** Filename for the package manifest used when resolving the tool version. */
export const PKG_FILENAME = 'package.json';

/** Fallback value to use when a package version cannot be determined. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Command name shown in usage and help output. */
export const CLI_NAME = 'cs-build-prep';

/** Name the repository root directory must carry. */
export const REPOSITORY_DIR_NAME = 'Color Selector';

/** Opening tag searched for in project configuration files. */
export const ASSEMBLY_VERSION_OPEN_TAG = '<AssemblyVersion>';

/** Closing tag written after the new version string. */
export const ASSEMBLY_VERSION_CLOSE_TAG = '</AssemblyVersion>';
