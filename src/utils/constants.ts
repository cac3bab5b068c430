/**
 * Regular expression describing a conventional commit subject.
 * Group 1: type
 * Group 2: scope (optional, without parentheses)
 * Group 3: breaking change marker `!` (optional)
 * Group 4: description, everything after `": "` to the end of the line
 *
 * The scope group is lazy so that it stops at the first closing parenthesis. The description
 * excludes only `\n`; `.` would also stop at `\r`, U+2028 and U+2029.
 */
export const SUBJECT_REGEX = /^([a-z]+)(?:\(([a-z0-9][a-z0-9./-]*?)\))?(!)?: ([^\n]*)$/;

/**
 * Subjects produced by git or GitHub when merging. These are exempt from every rule.
 *
 * - `Merge pull request #123 from owner/branch`
 * - `Merge branch 'feature'` and `Merge branch 'feature' into main`
 * - `Merge 1a2b3c4 into 5d6e7f8`
 */
export const MERGE_SUBJECT_PATTERNS: readonly RegExp[] = [
  /^Merge pull request #\d+ from \S+/,
  /^Merge branch '[^']+'(?: into \S+)?$/,
  /^Merge [0-9a-f]{7,40} into [0-9a-f]{7,40}$/,
];

/**
 * Violation messages emitted by the rule evaluator.
 */
export const VIOLATION = {
  FORMAT: "format must be 'type(scope)?: subject' with lowercase type and a space after colon",
  SCOPE_MISSING: 'scope is required but missing',
  SUBJECT_EMPTY: 'subject must not be empty',
  SUBJECT_PERIOD: 'subject must not end with a period',
  SUBJECT_CAPITAL: 'subject should start lowercase (imperative mood)',
} as const;

export const DEFAULT_ALLOWED_TYPES = 'feat,fix,docs,style,refactor,perf,test,build,ci,chore,revert';
export const DEFAULT_REQUIRE_SCOPE_EXCEPT_TYPES = 'revert';
export const DEFAULT_MAX_SUBJECT_LENGTH = 72;
export const DEFAULT_MAX_COMMITS = 200;

/**
 * Boolean environment values that are read as `true` (compared lowercase).
 */
export const TRUTHY_VALUES: readonly string[] = ['true', 'yes', 'on', '1'];

/**
 * Actor whose runs are skipped when `SKIP_FOR_BOT` is enabled.
 */
export const RELEASE_BOT_ACTOR = 'release-please[bot]';

/**
 * Title used for run-level annotations.
 */
export const ANNOTATION_TITLE = 'commitlint';

/**
 * Number of hash characters shown in per-commit annotations.
 */
export const SHORT_SHA_LENGTH = 7;

/**
 * Separator between hash and subject in the git log format. `%x00` renders as a NUL byte.
 */
export const GIT_LOG_FIELD_SEPARATOR = '\x00';
export const GIT_LOG_FORMAT = '--pretty=format:%H%x00%s';
