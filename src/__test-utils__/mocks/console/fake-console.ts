/**
 * Console stand-in for tests that assert on what the CLI prints.
 */

import type { Mock } from 'vitest';
import { vi } from 'vitest';

export type ConsoleStream = 'log' | 'warn' | 'error';

export interface FakeConsole {
  readonly log: Mock<unknown[], void>;
  readonly warn: Mock<unknown[], void>;
  readonly error: Mock<unknown[], void>;
  /** Printed lines across all streams, in print order. */
  readonly printed: () => string[];
  /** Printed lines of one stream. */
  readonly printedTo: (stream: ConsoleStream) => string[];
}

/**
 * Create a console whose methods are spies that also record each printed
 * line with the stream it went to.
 */
export function fakeConsole(): FakeConsole {
  const entries: Array<{ stream: ConsoleStream; text: string }> = [];
  const recorder = (stream: ConsoleStream) =>
    vi.fn((...data: unknown[]) => {
      entries.push({ stream, text: data.map(String).join(' ') });
    });

  return {
    log: recorder('log'),
    warn: recorder('warn'),
    error: recorder('error'),
    printed: () => entries.map((entry) => entry.text),
    printedTo: (stream) =>
      entries.filter((entry) => entry.stream === stream).map((entry) => entry.text),
  };
}
