/**
 * Tests for run summary building.
 */

import { describe, expect, it, vi } from 'vitest';

import { buildRunSummary, recordWarnings } from './run-summary.ts';

const spyLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('modules/run-summary', () => {
  it('records warnings while still forwarding them', () => {
    const inner = spyLogger();
    const recorder = recordWarnings(inner);

    recorder.logger.warn('first', { filePath: '/r/a' });
    recorder.logger.info('not a warning');
    recorder.logger.warn('second');

    expect(recorder.warnings()).toEqual(['first', 'second']);
    expect(inner.warn).toHaveBeenCalledWith('first', { filePath: '/r/a' });
    expect(inner.info).toHaveBeenCalledWith('not a warning', undefined);
  });

  it('returns a copy of the recorded warnings', () => {
    const recorder = recordWarnings(spyLogger());
    const before = recorder.warnings();

    recorder.logger.warn('late');

    expect(before).toEqual([]);
  });

  it('flattens removed directories and keeps patch results', () => {
    const summary = buildRunSummary(
      '2.1.3',
      {
        passes: [
          { pass: 1, removed: ['/r/A/bin', '/r/A/obj'] },
          { pass: 2, removed: [] },
        ],
        retriedFailures: 0,
      },
      [
        { filePath: '/r/A/A.csproj', status: 'updated', lineIndex: 4 },
        { filePath: '/r/B/B.csproj', status: 'tag-missing' },
      ],
      ['Warning: could not find AssemblyVersion line in /r/B/B.csproj'],
    );

    expect(summary).toEqual({
      version: '2.1.3',
      removedDirectories: ['/r/A/bin', '/r/A/obj'],
      patchResults: [
        { filePath: '/r/A/A.csproj', status: 'updated', lineIndex: 4 },
        { filePath: '/r/B/B.csproj', status: 'tag-missing' },
      ],
      warnings: ['Warning: could not find AssemblyVersion line in /r/B/B.csproj'],
    });
  });
});
