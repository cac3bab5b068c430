/**
 * Context and runtime related types
 */

/**
 * CI runtime details read from the GitHub Actions environment.
 * Every field is optional in the environment, so local runs get empty strings.
 */
export interface Context {
  /**
   * The name of the triggering event (e.g. `pull_request`, `push`).
   */
  eventName: string;

  /**
   * The target branch of the pull request. Only set for pull request events.
   */
  baseRef: string;

  /**
   * The login of the user or app that triggered the workflow.
   */
  actor: string;

  /**
   * Whether the triggering event is a pull request event (`pull_request` or `pull_request_target`).
   */
  isPullRequest: boolean;
}
