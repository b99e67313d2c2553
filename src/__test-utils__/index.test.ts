/**
 * Color Selector Build Prep - Test Utilities Index Tests
 *
 * Verifies:
 *   - The repository fixture lays out both projects
 *   - Fixture options take effect
 */

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';

import * as testUtils from './index.ts';

describe('Test utilities index', () => {
  let baseDir: string | undefined;

  afterEach(async () => {
    if (baseDir) {
      await testUtils.removeTempDir(baseDir);
      baseDir = undefined;
    }
  });

  it('creates the default repository layout', async () => {
    const fixture = await testUtils.createRepositoryFixture();
    baseDir = fixture.baseDir;

    expect(path.basename(fixture.root)).toBe('Color Selector');
    expect(fixture.componentCsproj).toBe(
      path.join(fixture.root, 'ColorSelector', 'ColorSelector.csproj'),
    );
    expect(fixture.testAppCsproj).toBe(
      path.join(fixture.root, 'ColorSelectorTestApp', 'ColorSelectorStandalone.csproj'),
    );
    expect(await readFile(fixture.componentCsproj, 'utf8')).toBe(testUtils.COMPONENT_CSPROJ);
    expect(await readFile(fixture.testAppCsproj, 'utf8')).toBe(testUtils.TEST_APP_CSPROJ);
    expect((await stat(path.join(fixture.componentDir, 'bin'))).isDirectory()).toBe(true);
    expect((await stat(path.join(fixture.testAppDir, 'obj'))).isDirectory()).toBe(true);
  });

  it('honors the repository name and build output options', async () => {
    const fixture = await testUtils.createRepositoryFixture({
      repositoryName: 'Other Repo',
      withBuildOutput: false,
      testAppCsproj: '<Project />\n',
    });
    baseDir = fixture.baseDir;

    expect(path.basename(fixture.root)).toBe('Other Repo');
    await expect(stat(path.join(fixture.componentDir, 'bin'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
    expect(await readFile(fixture.testAppCsproj, 'utf8')).toBe('<Project />\n');
  });
});
