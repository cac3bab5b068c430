import { execFileSync } from 'node:child_process';
import type { Commit } from '@/types';
import { ANNOTATION_TITLE, GIT_LOG_FIELD_SEPARATOR, GIT_LOG_FORMAT } from '@/utils/constants';
import { info, warning } from '@actions/core';
import which from 'which';

/**
 * Extracts a one-line reason from a failed git invocation. Prefers the first line of stderr
 * since that is where git reports bad revisions and missing repositories.
 */
export function describeGitError(error: unknown): string {
  if (error instanceof Error) {
    // execFileSync attaches the captured stderr to the thrown error
    const stderr = 'stderr' in error ? error.stderr : '';
    const firstLine = String(stderr ?? '')
      .trim()
      .split('\n')[0];

    return firstLine || error.message;
  }

  return String(error);
}

/**
 * Parses `git log` output produced with `GIT_LOG_FORMAT` into commits.
 *
 * Each line holds `<hash>\0<subject>`. Blank lines and lines without the separator are
 * skipped; both fields are trimmed.
 */
export function parseGitLog(output: string): Commit[] {
  const commits: Commit[] = [];

  for (const line of output.split('\n')) {
    if (line.trim() === '') {
      continue;
    }

    const separatorIndex = line.indexOf(GIT_LOG_FIELD_SEPARATOR);
    if (separatorIndex === -1) {
      continue;
    }

    commits.push({
      sha: line.slice(0, separatorIndex).trim(),
      subject: line.slice(separatorIndex + 1).trim(),
    });
  }

  return commits;
}

function gitLog(gitPath: string, args: string[]): string {
  return execFileSync(gitPath, ['log', '--no-merges', GIT_LOG_FORMAT, ...args], {
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 16 * 1024 * 1024,
  });
}

/**
 * Reads non-merge commits from the repository in the current working directory.
 *
 * When the range cannot be read (for example a base branch that was not fetched), a warning
 * is emitted and the most recent commit is read instead. A failure of that fallback is fatal.
 *
 * @param range - A git revision range such as `origin/main..HEAD`, or an empty string for HEAD
 * @param limit - Maximum number of commits to return; 0 disables the cap
 * @returns Commits in `git log` order (newest first)
 * @throws {Error} If git is not found in PATH
 * @throws {Error} If both the requested range and the HEAD fallback fail
 */
export function getCommits(range: string, limit: number): Commit[] {
  const gitPath = which.sync('git');

  const args: string[] = [];
  if (range !== '') {
    args.push(range);
  }
  if (limit > 0) {
    args.push('-n', String(limit));
  }

  info(`Reading commits: git log ${args.join(' ') || '(HEAD)'}`);

  let output: string;
  try {
    output = gitLog(gitPath, args);
  } catch (error) {
    warning(`Could not read git log (${describeGitError(error)}). Falling back to HEAD`, { title: ANNOTATION_TITLE });

    try {
      output = gitLog(gitPath, ['-n', '1']);
    } catch (fallbackError) {
      throw new Error(`Failed to get git commits: ${describeGitError(fallbackError)}`, { cause: fallbackError });
    }
  }

  return parseGitLog(output);
}
