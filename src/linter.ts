import type { Commit, LintReport, LintRules } from '@/types';
import { isMergeSubject, parseSubject } from '@/subject-parser';
import { VIOLATION } from '@/utils/constants';
import { debug } from '@actions/core';

/**
 * Checks a single commit subject against the rule set.
 *
 * Merge subjects always pass. A subject that does not follow the conventional format yields
 * exactly one format violation and no other rule is evaluated. Otherwise every rule runs and
 * all failures are returned in a fixed order:
 *
 * 1. type allow-list
 * 2. required scope
 * 3. scope allow-list
 * 4. empty description
 * 5. description length
 * 6. trailing period
 * 7. leading capital letter
 *
 * Only the emptiness check looks at the trimmed description. Length, period and casing are
 * checked on the description as written. Length is counted in UTF-8 bytes.
 *
 * @param subject - The commit subject line
 * @param rules - The rule set to apply
 * @returns Violation messages, empty when the subject complies
 *
 * @example
 * ```typescript
 * lintSubject('unknown: some message', { ...rules, allowedTypes: ['feat', 'fix'] })
 * // → ["type 'unknown' is not allowed. Allowed: feat, fix"]
 * ```
 */
export function lintSubject(subject: string, rules: LintRules): string[] {
  if (isMergeSubject(subject)) {
    return [];
  }

  const parsed = parseSubject(subject);
  if (!parsed) {
    return [VIOLATION.FORMAT];
  }

  const { type, scope, description } = parsed;
  const violations: string[] = [];

  if (rules.allowedTypes !== null && !rules.allowedTypes.includes(type)) {
    violations.push(`type '${type}' is not allowed. Allowed: ${rules.allowedTypes.join(', ')}`);
  }

  if (rules.requireScope && scope === '' && !rules.requireScopeExceptTypes.includes(type)) {
    violations.push(VIOLATION.SCOPE_MISSING);
  }

  if (scope !== '' && rules.allowedScopes !== null && !rules.allowedScopes.includes(scope)) {
    violations.push(`scope '${scope}' is not in allowed list: ${rules.allowedScopes.join(', ')}`);
  }

  if (description.trim() === '') {
    violations.push(VIOLATION.SUBJECT_EMPTY);
  }

  const length = Buffer.byteLength(description, 'utf8');
  if (length > rules.maxSubjectLength) {
    violations.push(`subject too long (${length} > ${rules.maxSubjectLength})`);
  }

  if (description.endsWith('.')) {
    violations.push(VIOLATION.SUBJECT_PERIOD);
  }

  if (!rules.allowCapitalSubject && /^[A-Z]/.test(description)) {
    violations.push(VIOLATION.SUBJECT_CAPITAL);
  }

  return violations;
}

/**
 * Lints each commit in history order and aggregates the violations.
 */
export function lintCommits(commits: ReadonlyArray<Commit>, rules: LintRules): LintReport {
  const report: LintReport = { commitCount: commits.length, violationCount: 0, results: [] };

  for (const commit of commits) {
    const violations = lintSubject(commit.subject, rules);
    debug(`${commit.sha}: ${violations.length} violation(s)`);

    if (violations.length > 0) {
      report.violationCount += violations.length;
      report.results.push({ commit, violations });
    }
  }

  return report;
}
