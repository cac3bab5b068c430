/**
 * Configuration related types
 */

/**
 * The rule set a commit subject is evaluated against.
 *
 * List fields use `null` for "no restriction". A non-null list is an exclusive allow-list,
 * so an empty array rejects every value.
 */
export interface LintRules {
  /**
   * Commit types that may appear before the colon (e.g. `feat`, `fix`).
   * When `null`, any lowercase type is accepted.
   */
  readonly allowedTypes: readonly string[] | null;

  /**
   * Scopes that may appear inside the parentheses. Only checked when a scope is present.
   * When `null`, any scope matching the grammar is accepted.
   */
  readonly allowedScopes: readonly string[] | null;

  /**
   * Whether every subject must carry a scope.
   */
  readonly requireScope: boolean;

  /**
   * Types that are exempt from `requireScope` (e.g. `revert`).
   */
  readonly requireScopeExceptTypes: readonly string[];

  /**
   * Whether the description may start with an uppercase ASCII letter.
   */
  readonly allowCapitalSubject: boolean;

  /**
   * Maximum length of the description (the text after `": "`).
   */
  readonly maxSubjectLength: number;
}

/**
 * Complete run configuration: the lint rules plus settings that control the run itself.
 */
export interface Config extends LintRules {
  /**
   * Skip the whole run when the triggering actor is the release automation bot.
   */
  readonly skipForBot: boolean;

  /**
   * Maximum number of commits read from history per run.
   */
  readonly maxCommits: number;
}
