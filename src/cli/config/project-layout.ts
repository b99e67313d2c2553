/**
 * Color Selector Build Prep - Project Layout
 *
 * Role: Authoritative registry of the projects prepared before a build.
 *
 * This file is:
 *   - The single source of truth for project folders and config files
 *   - Passed explicitly into the cleaner and patcher
 *   - Immutable once loaded
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { CliError } from '../../errors/errors.ts';
import { REPOSITORY_DIR_NAME } from '../constants/paths.ts';
import { CLEAN_RETRY_DELAY_MS } from '../constants/time.ts';
import type { RetryPolicy } from '../execution/retry.ts';

/**
 * Canonical description of a project whose build output is cleaned and whose
 * configuration file carries the AssemblyVersion tag.
 */
export interface ProjectConfig {
  /** Stable identifier used in logs and summaries */
  readonly id: string;

  /** Project folder, relative to the repository root */
  readonly directory: string;

  /** Configuration file, relative to the project folder */
  readonly configFile: string;
}

/**
 * Everything the run needs to know about the repository, in one record.
 */
export interface ProjectLayout {
  /** Name the repository root directory must carry */
  readonly repositoryDirName: string;
  readonly projects: readonly ProjectConfig[];
  /** Directory-name patterns removed from every project folder */
  readonly cleanTargets: readonly string[];
  readonly retry: RetryPolicy;
}

/**
 * A project with its folder and configuration file resolved to absolute paths.
 */
export interface ResolvedProject {
  readonly id: string;
  readonly rootDir: string;
  readonly configFile: string;
}

/**
 * Authoritative project registry.
 */
export const PROJECT_REGISTRY: readonly ProjectConfig[] = [
  {
    id: 'color-selector',
    directory: 'ColorSelector',
    configFile: 'ColorSelector.csproj',
  },
  {
    id: 'color-selector-test-app',
    directory: 'ColorSelectorTestApp',
    configFile: 'ColorSelectorStandalone.csproj',
  },
] as const;

export const DEFAULT_CLEAN_TARGETS: readonly string[] = ['bin', 'obj'];

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  passes: 2,
  delayMs: CLEAN_RETRY_DELAY_MS,
  backoffFactor: 1,
};

export const DEFAULT_PROJECT_LAYOUT: ProjectLayout = {
  repositoryDirName: REPOSITORY_DIR_NAME,
  projects: PROJECT_REGISTRY,
  cleanTargets: DEFAULT_CLEAN_TARGETS,
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * The directory holding this tool's `package.json`. The tool lives at the
 * root of the repository it prepares, so this is the default repository root.
 */
export const DEFAULT_REPOSITORY_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

/* -------------------------------------------------------------------------- */
/* Layout validation                                                           */
/* -------------------------------------------------------------------------- */

/**
 * Validate layout invariants such as unique ids, relative paths, and a usable
 * retry policy.
 *
 * @throws {CliError} when an invariant is violated.
 */
export function assertValidLayout(layout: ProjectLayout): void {
  const ids = new Set<string>();

  for (const project of layout.projects) {
    if (ids.has(project.id)) {
      throw new CliError('CLI_INVALID_ARGUMENT', `Duplicate project id detected: ${project.id}`);
    }
    ids.add(project.id);

    if (project.directory.trim().length === 0 || path.isAbsolute(project.directory)) {
      throw new CliError(
        'CLI_INVALID_PATH',
        `Project directory must be a non-empty relative path for: ${project.id}`,
      );
    }

    if (project.configFile.trim().length === 0 || path.isAbsolute(project.configFile)) {
      throw new CliError(
        'CLI_INVALID_PATH',
        `Config file must be a non-empty relative path for: ${project.id}`,
      );
    }
  }

  if (layout.cleanTargets.some((target) => target.trim().length === 0)) {
    throw new CliError('CLI_INVALID_ARGUMENT', 'Clean targets must be non-empty patterns');
  }

  const { passes, delayMs, backoffFactor } = layout.retry;
  if (!Number.isInteger(passes) || passes < 1) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Retry passes must be a positive integer: ${passes}`);
  }
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Retry delay must be non-negative: ${delayMs}`);
  }
  if (!Number.isFinite(backoffFactor) || backoffFactor < 1) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `Retry backoff factor must be at least 1: ${backoffFactor}`,
    );
  }
}

assertValidLayout(DEFAULT_PROJECT_LAYOUT);

/* -------------------------------------------------------------------------- */
/* Resolution                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Resolve each project of `layout` against the repository root using the
 * platform path separator.
 */
export function resolveProjectPaths(
  repositoryRoot: string,
  layout: ProjectLayout = DEFAULT_PROJECT_LAYOUT,
): readonly ResolvedProject[] {
  return layout.projects.map((project) => {
    const rootDir = path.join(repositoryRoot, project.directory);
    return {
      id: project.id,
      rootDir,
      configFile: path.join(rootDir, project.configFile),
    };
  });
}
