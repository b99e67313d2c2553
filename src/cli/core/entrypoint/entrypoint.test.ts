/**
 * Tests for the CLI entrypoint wiring (broken pipes, error handling, signals).
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { FileSystemError } from '../../../errors/errors.ts';
import type { MainResult } from '../../execution/execution.ts';
import {
  handleBrokenPipe,
  runEntrypoint,
  SIGNAL_EXIT_CODES,
  setupBrokenPipeHandlers,
  setupSignalHandlers,
} from './entrypoint.ts';

const errnoError = (message: string, code: string): NodeJS.ErrnoException =>
  Object.assign(new Error(message), { code });

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('entrypoint.ts', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('broken pipes', () => {
    it('ignores EPIPE and rethrows other errors', () => {
      expect(() => handleBrokenPipe(errnoError('EPIPE', 'EPIPE'))).not.toThrow();
      expect(() => handleBrokenPipe(errnoError('boom', 'OTHER'))).toThrow('boom');
    });

    it('installs and removes the stdout and stderr listeners', () => {
      const stdoutBefore = process.stdout.listenerCount('error');
      const stderrBefore = process.stderr.listenerCount('error');

      const remove = setupBrokenPipeHandlers();
      expect(process.stdout.listeners('error')).toContain(handleBrokenPipe);
      expect(process.stderr.listeners('error')).toContain(handleBrokenPipe);

      remove();
      expect(process.stdout.listenerCount('error')).toBe(stdoutBefore);
      expect(process.stderr.listenerCount('error')).toBe(stderrBefore);
    });
  });

  describe('signals', () => {
    it('maps signals to 128 + signal number', () => {
      expect(SIGNAL_EXIT_CODES).toEqual({ SIGINT: 130, SIGTERM: 143 });
    });

    it('acts on the first signal only', () => {
      const onSignal = vi.fn();
      const handlers = setupSignalHandlers({ onSignal }, { error: vi.fn() });

      try {
        process.emit('SIGTERM');
        process.emit('SIGINT');

        expect(handlers.received()).toBe('SIGTERM');
        expect(process.exitCode).toBe(143);
        expect(onSignal.mock.calls).toEqual([['SIGTERM']]);
      } finally {
        handlers.dispose();
      }
    });

    it('reports a handler that throws', () => {
      const errorSpy = vi.fn();
      const handlers = setupSignalHandlers(
        {
          onSignal: () => {
            throw new Error('signal-fail');
          },
        },
        { error: errorSpy },
      );

      try {
        process.emit('SIGINT');
        expect(errorSpy).toHaveBeenCalledWith('WARN: signal handler failed: signal-fail');
      } finally {
        handlers.dispose();
      }
    });

    it('reports a handler that rejects', async () => {
      const errorSpy = vi.fn();
      const handlers = setupSignalHandlers(
        { onSignal: () => Promise.reject(new Error('async-signal-fail')) },
        { error: errorSpy },
      );

      try {
        process.emit('SIGINT');
        await flush();
        expect(errorSpy).toHaveBeenCalledWith('WARN: signal handler failed: async-signal-fail');
      } finally {
        handlers.dispose();
      }
    });

    it('removes its listeners on dispose', () => {
      const before = process.listenerCount('SIGINT');
      const handlers = setupSignalHandlers({}, { error: vi.fn() });

      expect(process.listenerCount('SIGINT')).toBe(before + 1);
      handlers.dispose();
      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });

  describe('runEntrypoint', () => {
    it('sets the exit code from the main result', async () => {
      await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 1 }) });
      expect(process.exitCode).toBe(1);

      await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });
      expect(process.exitCode).toBe(0);
    });

    it('wraps unexpected rejections as UNEXPECTED_ERROR', async () => {
      const errorSpy = vi.fn();

      await runEntrypoint({
        mainFn: () => Promise.reject(new Error('boom')),
        console: { error: errorSpy },
      });

      expect(errorSpy).toHaveBeenCalledWith('❌ Fatal error: UNEXPECTED_ERROR: boom');
      expect(process.exitCode).toBe(1);
    });

    it('wraps non-Error rejections', async () => {
      const errorSpy = vi.fn();

      await runEntrypoint({
        mainFn: () => Promise.reject('boom-string'),
        console: { error: errorSpy },
      });

      expect(errorSpy).toHaveBeenCalledWith('❌ Fatal error: UNEXPECTED_ERROR: boom-string');
    });

    it('keeps the code of an application error', async () => {
      const errorSpy = vi.fn();

      await runEntrypoint({
        mainFn: () => Promise.reject(new FileSystemError('FS_READ_FAILED', 'Failed to read x')),
        console: { error: errorSpy },
      });

      expect(errorSpy).toHaveBeenCalledWith('❌ Fatal error: FS_READ_FAILED: Failed to read x');
    });

    it('uses the default console when none is injected', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      await runEntrypoint({ mainFn: () => Promise.reject(new Error('boom')) });

      expect(errorSpy).toHaveBeenCalledWith('❌ Fatal error: UNEXPECTED_ERROR: boom');
      errorSpy.mockRestore();
    });

    it('lets a signal exit code win over the main result', async () => {
      let resolveMain: (result: MainResult) => void = () => undefined;
      const mainPromise = new Promise<MainResult>((resolve) => {
        resolveMain = resolve;
      });

      const running = runEntrypoint({ mainFn: () => mainPromise, console: { error: vi.fn() } });
      process.emit('SIGINT');
      resolveMain({ exitCode: 0 });
      await running;

      expect(process.exitCode).toBe(130);
    });

    it('keeps the signal exit code when main then fails', async () => {
      const errorSpy = vi.fn();

      await runEntrypoint({
        mainFn: () => {
          process.emit('SIGTERM');
          return Promise.reject(new Error('interrupted'));
        },
        console: { error: errorSpy },
      });

      expect(errorSpy).toHaveBeenCalledWith('❌ Fatal error: UNEXPECTED_ERROR: interrupted');
      expect(process.exitCode).toBe(143);
    });

    it('removes its listeners when done', async () => {
      const sigintBefore = process.listenerCount('SIGINT');
      const stdoutBefore = process.stdout.listenerCount('error');

      await runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });

      expect(process.listenerCount('SIGINT')).toBe(sigintBefore);
      expect(process.stdout.listenerCount('error')).toBe(stdoutBefore);
    });
  });
});
