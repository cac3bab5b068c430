import { getConfig } from '@/config';
import { getContext } from '@/context';
import { getCommits } from '@/git';
import { lintCommits } from '@/linter';
import { reportSummary, reportViolations } from '@/report';
import type { Config, Context } from '@/types';
import { inferRange, parseArguments } from '@/utils/arguments';
import { ANNOTATION_TITLE, RELEASE_BOT_ACTOR } from '@/utils/constants';
import { info, notice, setFailed, setOutput, warning } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Lints the subjects of the commits in a range and reports violations as workflow annotations.
 *
 * This function:
 * 1. Loads the config and CI context
 * 2. Skips the run for the release bot when `SKIP_FOR_BOT` is enabled
 * 3. Resolves the range from `--range` or from the pull request base branch
 * 4. Reads the commits and lints each subject in order
 * 5. Reports every violation and fails the run when there is at least one
 *
 * An empty range is a successful no-op.
 *
 * @param argv - Command line arguments, defaulting to the process arguments
 * @throws Will capture and report any errors through setFailed
 */
export function run(argv: ReadonlyArray<string> = process.argv.slice(2)): void {
  try {
    const { config, context } = initialize();

    if (config.skipForBot && context.actor === RELEASE_BOT_ACTOR) {
      notice(`Skipping for ${RELEASE_BOT_ACTOR}.`, { title: ANNOTATION_TITLE });
      return;
    }

    const { range = inferRange(context) } = parseArguments(argv);
    const commits = getCommits(range, config.maxCommits);

    if (commits.length === 0) {
      warning('No commits found to lint.', { title: ANNOTATION_TITLE });
      setOutput('violation-count', 0);
      setOutput('commit-count', 0);
      return;
    }

    info(`Linting ${commits.length} commit(s)`);

    const report = lintCommits(commits, config);
    reportViolations(report);
    reportSummary(report);
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}
