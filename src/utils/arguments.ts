import { parseArgs } from 'node:util';
import type { CliArguments, Context } from '@/types';

/**
 * Parses command line arguments (without the node executable and script path).
 *
 * Supports `--range <spec>` and `--range=<spec>`; when given more than once the last value wins.
 *
 * @throws {Error} If `--range` has no value, an unknown option is given or a positional argument is passed
 */
export function parseArguments(argv: ReadonlyArray<string>): CliArguments {
  let values: { range?: string };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        range: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new Error(`Invalid arguments: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }

  if (values.range === undefined) {
    return {};
  }
  if (values.range.trim() === '') {
    throw new Error("Option '--range' requires a value");
  }

  return { range: values.range };
}

/**
 * Derives the commit range from the CI context. Pull request runs lint the commits between the
 * base branch and HEAD; every other run falls back to git's default range.
 *
 * @example
 * inferRange({ eventName: 'pull_request', baseRef: 'main', actor: '', isPullRequest: true })
 * // → 'origin/main..HEAD'
 */
export function inferRange(context: Context): string {
  if (context.isPullRequest && context.baseRef !== '') {
    return `origin/${context.baseRef}..HEAD`;
  }

  return '';
}
