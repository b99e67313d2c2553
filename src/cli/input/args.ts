/**
 * Color Selector Build Prep - CLI Argument Parsing
 *
 * Role:
 *   Turn raw argv into structured CLIArgs.
 *
 * Responsibilities:
 *   - Parse flags and the version positional
 *   - Keep positionals after the first aside, unused
 *   - Map parse errors to descriptive CliErrors
 *
 * The version positional is only captured here; its format is checked by
 * `validateVersionString` so that usage output stays separate from
 * validation failures.
 */

import { parseArgs } from 'node:util';
import { CliError, hasErrorProperty } from '../../errors/errors.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

/**
 * Parsed CLI arguments normalized into strongly typed properties.
 */
export interface CLIArgs {
  /** Raw version positional; absent when none was given. */
  readonly versionString?: string;
  /** Positionals after the version string, which the run ignores. */
  readonly ignoredArguments?: readonly string[];
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
  readonly structuredLogs: boolean;
}

type RawCliValues = {
  readonly help?: boolean | undefined;
  readonly version?: boolean | undefined;
  readonly verbose?: boolean | undefined;
  readonly debug?: boolean | undefined;
  readonly 'structured-logs'?: boolean | undefined;
};

interface IndexedPositional {
  readonly index: number;
  readonly value: string;
}

/**
 * A single-dash argument containing a dot, such as `-1.2.3`. No option takes
 * that shape, so it is a positional rather than a cluster of short flags.
 */
const DASHED_POSITIONAL = /^-[^-].*\./;

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @param argv - Raw arguments (defaults to `process.argv.slice(2)`).
 * @throws {CliError} when parsing fails.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  try {
    const terminator = argv.indexOf('--');
    const optionsEnd = terminator === -1 ? argv.length : terminator;
    const dashed: IndexedPositional[] = [];
    const args: string[] = [];
    const argIndexes: number[] = [];

    argv.forEach((arg, index) => {
      if (index < optionsEnd && DASHED_POSITIONAL.test(arg)) {
        dashed.push({ index, value: arg });
      } else {
        args.push(arg);
        argIndexes.push(index);
      }
    });

    const { values, tokens } = parseArgs({
      args,
      strict: true,
      allowPositionals: true,
      tokens: true,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        verbose: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        'structured-logs': { type: 'boolean', default: false },
      },
    });

    const positionals = tokens
      .flatMap((token): IndexedPositional[] =>
        token.kind === 'positional'
          ? [{ index: argIndexes[token.index] ?? token.index, value: token.value }]
          : [],
      )
      .concat(dashed)
      .sort((a, b) => a.index - b.index)
      .map((positional) => positional.value);

    return normalizeCliArgs(values, positionals);
  } catch (error) {
    throw mapParseArgsError(error);
  }
}

/**
 * Normalize the `parseArgs` output into our CLI shape.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  const [versionString, ...ignoredArguments] = positionals;

  return {
    ...(versionString === undefined ? {} : { versionString }),
    ...(ignoredArguments.length > 0 ? { ignoredArguments } : {}),
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true || values.debug === true,
    structuredLogs: values['structured-logs'] === true,
  };
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
export function mapParseArgsError(error: unknown): Error {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof Error && hasErrorProperty(error, 'code')) {
    const option = /'([^']+)'/.exec(error.message)?.[1];

    if (error.code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    if (error.code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE') {
      return new CliError('CLI_INVALID_ARGUMENT', error.message, { cause: error });
    }
  }

  if (error instanceof Error) {
    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }
  return new CliError('CLI_PARSE_ERROR', String(error));
}
