/**
 * Color Selector Build Prep - Main Entry Point Tests
 *
 * Verifies the package surface exposed to other scripts.
 */

import path from 'node:path';
import { describe, expect, it } from 'vitest';

import * as pkg from './index.ts';

describe('Color Selector Build Prep - Main Entry Point', () => {
  it('exposes the default layout with both projects', () => {
    expect(pkg.DEFAULT_PROJECT_LAYOUT.repositoryDirName).toBe('Color Selector');
    expect(pkg.DEFAULT_PROJECT_LAYOUT.projects.map((project) => project.directory)).toEqual([
      'ColorSelector',
      'ColorSelectorTestApp',
    ]);
    expect(pkg.DEFAULT_PROJECT_LAYOUT.cleanTargets).toEqual(['bin', 'obj']);
    expect(pkg.DEFAULT_PROJECT_LAYOUT.retry).toEqual({
      passes: 2,
      delayMs: 3000,
      backoffFactor: 1,
    });
  });

  it('defaults the repository root to the package directory', () => {
    expect(path.isAbsolute(pkg.DEFAULT_REPOSITORY_ROOT)).toBe(true);
  });

  it('exposes the error hierarchy', () => {
    const error = new pkg.CliError('CLI_INVALID_VERSION', 'bad');

    expect(error).toBeInstanceOf(pkg.AppError);
    expect(pkg.isAppError(error)).toBe(true);
    expect(pkg.formatErrorMessage(error)).toBe('CLI_INVALID_VERSION: bad');
  });
});
