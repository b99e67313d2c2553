/**
 * Color Selector Build Prep - CLI Tests (behavioral)
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';

import {
  COMPONENT_CSPROJ,
  createRepositoryFixture,
  fakeConsole,
  type RepositoryFixture,
  removeTempDir,
} from '../../__test-utils__/index.ts';
import { __test__, getPackageVersion } from './version/version.ts';
import { main, showHelp } from './index.ts';

const noSleep = () => Promise.resolve();

describe('Color Selector Build Prep - CLI', () => {
  let fixture: RepositoryFixture | undefined;

  afterEach(async () => {
    __test__.resetCache();
    if (fixture) {
      await removeTempDir(fixture.baseDir);
      fixture = undefined;
    }
  });

  it('runs a full preparation from argv', async () => {
    fixture = await createRepositoryFixture();
    const out = fakeConsole();

    const result = await main({
      argv: ['3.4.5'],
      repositoryRoot: fixture.root,
      console: out,
      sleepFn: noSleep,
    });

    expect(result.exitCode).toBe(0);
    expect(result.summary?.version).toBe('3.4.5');
    expect(await readFile(fixture.componentCsproj, 'utf8')).toBe(
      COMPONENT_CSPROJ.replace('<AssemblyVersion>1.0.0<', '<AssemblyVersion>3.4.5<'),
    );
    expect(result.summary?.removedDirectories).toContain(path.join(fixture.testAppDir, 'bin'));
  });

  it('prints help with the injected layout and exits 0', async () => {
    const out = fakeConsole();

    const result = await main({ argv: ['--help'], console: out });

    expect(result).toEqual({ exitCode: 0 });
    expect(out.printed()).toEqual([showHelp()]);
  });

  it('prefers help over version when both are given', async () => {
    const out = fakeConsole();

    await main({ argv: ['--version', '--help'], console: out });

    expect(out.printed()).toEqual([showHelp()]);
  });

  it('prints the tool version', async () => {
    getPackageVersion({ readFileFn: () => '{"version":"4.0.0"}' });
    const out = fakeConsole();

    const result = await main({ argv: ['--version'], console: out });

    expect(result).toEqual({ exitCode: 0 });
    expect(out.printed()).toEqual(['cs-build-prep v4.0.0']);
  });

  it('ignores positionals after the version string', async () => {
    fixture = await createRepositoryFixture();
    const out = fakeConsole();

    const result = await main({
      argv: ['2.1.3', 'extra'],
      repositoryRoot: fixture.root,
      console: out,
      sleepFn: noSleep,
    });

    expect(result.exitCode).toBe(0);
    expect(out.printedTo('error')).toEqual([]);
    expect(await readFile(fixture.componentCsproj, 'utf8')).toBe(
      COMPONENT_CSPROJ.replace('<AssemblyVersion>1.0.0<', '<AssemblyVersion>2.1.3<'),
    );
  });
});
