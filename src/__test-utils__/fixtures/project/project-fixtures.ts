/**
 * Color Selector Build Prep - Repository Fixtures
 *
 * Role:
 *   Build a throwaway repository tree in the temp directory that looks like
 *   the one the CLI prepares.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Caller-cleaned (remove `baseDir` when done)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createTempDir } from '../../utils/temp-utils.ts';

/** Component project file with one AssemblyVersion line, four-space indent. */
export const COMPONENT_CSPROJ = [
  '<Project Sdk="Microsoft.NET.Sdk">',
  '',
  '  <PropertyGroup>',
  '    <TargetFramework>net8.0-windows</TargetFramework>',
  '    <UseWPF>true</UseWPF>',
  '    <AssemblyVersion>1.0.0</AssemblyVersion>',
  '    <FileVersion>1.0.0</FileVersion>',
  '  </PropertyGroup>',
  '',
  '</Project>',
  '',
].join('\n');

/** Test-app project file without an AssemblyVersion line. */
export const TEST_APP_CSPROJ = [
  '<Project Sdk="Microsoft.NET.Sdk">',
  '  <PropertyGroup>',
  '    <OutputType>WinExe</OutputType>',
  '    <UseWPF>true</UseWPF>',
  '  </PropertyGroup>',
  '</Project>',
  '',
].join('\n');

export interface RepositoryFixtureOptions {
  /** Name of the repository root folder. */
  readonly repositoryName?: string;
  /** Create `bin` and `obj` with a file inside each. */
  readonly withBuildOutput?: boolean;
  readonly componentCsproj?: string;
  readonly testAppCsproj?: string;
}

export interface RepositoryFixture {
  /** Temp directory holding the repository; remove it after the test. */
  readonly baseDir: string;
  readonly root: string;
  readonly componentDir: string;
  readonly testAppDir: string;
  readonly componentCsproj: string;
  readonly testAppCsproj: string;
}

/**
 * Create `<tmp>/<repositoryName>/{ColorSelector,ColorSelectorTestApp}` with
 * their project files and, optionally, build output.
 */
export async function createRepositoryFixture(
  options: RepositoryFixtureOptions = {},
): Promise<RepositoryFixture> {
  const {
    repositoryName = 'Color Selector',
    withBuildOutput = true,
    componentCsproj = COMPONENT_CSPROJ,
    testAppCsproj = TEST_APP_CSPROJ,
  } = options;

  const baseDir = await createTempDir('cs-repo-');
  const root = path.join(baseDir, repositoryName);
  const componentDir = path.join(root, 'ColorSelector');
  const testAppDir = path.join(root, 'ColorSelectorTestApp');

  for (const dir of [componentDir, testAppDir]) {
    await mkdir(dir, { recursive: true });
    if (withBuildOutput) {
      await mkdir(path.join(dir, 'bin', 'Debug'), { recursive: true });
      await mkdir(path.join(dir, 'obj'), { recursive: true });
      await writeFile(path.join(dir, 'bin', 'Debug', 'output.dll'), 'stale');
      await writeFile(path.join(dir, 'obj', 'project.assets.json'), '{}');
    }
  }

  const fixture: RepositoryFixture = {
    baseDir,
    root,
    componentDir,
    testAppDir,
    componentCsproj: path.join(componentDir, 'ColorSelector.csproj'),
    testAppCsproj: path.join(testAppDir, 'ColorSelectorStandalone.csproj'),
  };

  await writeFile(fixture.componentCsproj, componentCsproj, 'utf8');
  await writeFile(fixture.testAppCsproj, testAppCsproj, 'utf8');

  return fixture;
}
