/**
 * Color Selector Build Prep - Test Utilities Index
 *
 * Role:
 *   Centralized export point for all test utilities.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Single import source for test utilities
 *   - Pure re-exports with no logic
 */

export {
  COMPONENT_CSPROJ,
  createRepositoryFixture,
  type RepositoryFixture,
  type RepositoryFixtureOptions,
  TEST_APP_CSPROJ,
} from './fixtures/project/project-fixtures.ts';
export { fakeConsole } from './mocks/console/fake-console.ts';
export { createTempDir, createTempFile, removeTempDir } from './utils/temp-utils.ts';
