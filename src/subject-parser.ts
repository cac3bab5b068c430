import type { ParsedSubject } from '@/types';
import { MERGE_SUBJECT_PATTERNS, SUBJECT_REGEX } from '@/utils/constants';

/**
 * Determines whether a subject was generated by a merge (pull request merge, branch merge or
 * hash-to-hash merge). Only the shapes listed in `MERGE_SUBJECT_PATTERNS` are recognized.
 *
 * @example
 * ```typescript
 * isMergeSubject('Merge pull request #42 from octo/feature') // → true
 * isMergeSubject("Merge branch 'main' into feature")         // → true
 * isMergeSubject('Merged the branch')                        // → false
 * ```
 */
export function isMergeSubject(subject: string): boolean {
  return MERGE_SUBJECT_PATTERNS.some((pattern) => pattern.test(subject));
}

/**
 * Decomposes a commit subject into its conventional commit fields.
 *
 * The expected format is: `<type>[(scope)][!]: <description>`, where the type is lowercase
 * ASCII letters and the scope starts with a lowercase letter or digit followed by any of
 * `[a-z0-9./-]`. The description is returned exactly as written, including surrounding
 * whitespace; callers decide which checks see the trimmed value.
 *
 * @param subject - A single subject line
 * @returns The parsed fields, or `null` if the subject does not follow the format
 *
 * @example
 * ```typescript
 * parseSubject('feat(api)!: drop v1 routes')
 * // → { type: 'feat', scope: 'api', breaking: true, description: 'drop v1 routes' }
 *
 * parseSubject('Update readme')
 * // → null
 * ```
 */
export function parseSubject(subject: string): ParsedSubject | null {
  const match = SUBJECT_REGEX.exec(subject);
  if (!match) {
    return null;
  }

  const [, type, scope, bang, description] = match;

  return {
    type,
    scope: scope ?? '',
    breaking: bang === '!',
    description,
  };
}
