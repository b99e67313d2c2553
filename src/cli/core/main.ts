/**
 * Color Selector Build Prep - Main
 *
 * Role:
 *   Parse argv, answer `--help`/`--version`, and hand everything else to
 *   `executeWithArgs`.
 */

import { isCliError } from '../../errors/errors.ts';
import { executeWithArgs, type MainDeps, type MainResult } from '../execution/execution.ts';
import { type CLIArgs, parseCliArgs } from '../input/args.ts';
import { showHelp } from './help/formatter.ts';
import { showVersion } from './help/help.ts';

/**
 * Entry point used by the CLI entrypoint and tests.
 *
 * Argument errors are reported as `Error: <message>` with exit code 1;
 * anything else propagates to the caller.
 */
export async function main(deps: MainDeps = {}): Promise<MainResult> {
  const { argv = process.argv.slice(2), ...rest } = deps;
  const out = rest.console ?? console;

  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (isCliError(error)) {
      out.error(`Error: ${error.message}`);
      return { exitCode: 1 };
    }
    throw error;
  }

  // Handle help and version early
  if (args.help) {
    out.log(showHelp(rest.layout));
    return { exitCode: 0 };
  }

  if (args.version) {
    out.log(showVersion());
    return { exitCode: 0 };
  }

  return executeWithArgs(args, rest);
}
