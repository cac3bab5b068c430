import type { LintReport } from '@/types';
import { SHORT_SHA_LENGTH } from '@/utils/constants';
import { endGroup, error, info, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Shortens a commit hash for display. Hashes shorter than the display length are kept whole.
 */
export function shortSha(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH);
}

/**
 * Emits one error annotation per violation, titled with the short commit hash and carrying
 * the original subject so the offending commit can be found in the log.
 */
export function reportViolations(report: LintReport): void {
  for (const { commit, violations } of report.results) {
    for (const message of violations) {
      error(`${message} | '${commit.subject}'`, { title: `commit ${shortSha(commit.sha)}` });
    }
  }
}

/**
 * Sets the step outputs and the final status of the run.
 *
 * Outputs:
 * - `violation-count`: total number of violations
 * - `commit-count`: number of commits examined
 *
 * A run with any violation fails (exit code 1) with a summary line.
 */
export function reportSummary(report: LintReport): void {
  setOutput('violation-count', report.violationCount);
  setOutput('commit-count', report.commitCount);

  if (report.violationCount === 0) {
    info('All commit subjects comply with rules.');
    return;
  }

  const summary = `Found ${report.violationCount} errors across ${report.commitCount} commit(s).`;

  startGroup('Commit lint summary');
  info(summary);
  for (const { commit, violations } of report.results) {
    info(`${shortSha(commit.sha)} ${commit.subject} (${violations.length})`);
  }
  endGroup();

  setFailed(summary);
}
