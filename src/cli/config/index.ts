/**
 * Public configuration exports for the project layout and helpers.
 *
 * @remarks
 * This module exists to centralize exports so callers import from a single
 * stable path rather than reaching directly into the layout file.
 */

export {
  assertValidLayout,
  DEFAULT_CLEAN_TARGETS,
  DEFAULT_PROJECT_LAYOUT,
  DEFAULT_REPOSITORY_ROOT,
  DEFAULT_RETRY_POLICY,
  PROJECT_REGISTRY,
  type ProjectConfig,
  type ProjectLayout,
  type ResolvedProject,
  resolveProjectPaths,
} from './project-layout.ts';
