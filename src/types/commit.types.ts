/**
 * Types for commit history and subject linting.
 */

/**
 * A commit read from history.
 */
export interface Commit {
  /** The full commit hash. */
  sha: string;
  /** The first line of the commit message. */
  subject: string;
}

/**
 * The structural fields of a conventional commit subject.
 */
export interface ParsedSubject {
  /** The commit type (e.g. 'feat', 'fix') */
  type: string;
  /** The scope without parentheses, or an empty string when absent */
  scope: string;
  /** Whether `!` precedes the colon */
  breaking: boolean;
  /** Everything after `": "`, untrimmed */
  description: string;
}

/**
 * Violations found for a single commit.
 */
export interface CommitViolations {
  commit: Commit;
  violations: string[];
}

/**
 * Aggregated result of linting a list of commits.
 */
export interface LintReport {
  /** Number of commits examined. */
  commitCount: number;
  /** Total number of violations across all commits. */
  violationCount: number;
  /** Only commits with at least one violation, in history order. */
  results: CommitViolations[];
}
