import { afterEach, describe, expect, it } from 'vitest';

import { __test__, getPackageVersion } from '../version/version.ts';
import * as formatter from './formatter.ts';
import { showHelp, showUsage, showVersion } from './help.ts';

/**
 * Tests for `help.ts` helpers (`showHelp` / `showUsage` / `showVersion`).
 */
describe('help.ts', () => {
  afterEach(() => {
    __test__.resetCache();
  });

  it('re-exports the formatter functions', () => {
    expect(showHelp).toBe(formatter.showHelp);
    expect(showUsage).toBe(formatter.showUsage);
  });

  it('builds showVersion from the cached package version', () => {
    getPackageVersion({ readFileFn: () => '{"version":"9.9.9"}' });

    expect(showVersion()).toBe('cs-build-prep v9.9.9');
  });
});
