import type { Context } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

/**
 * Clears the cached context instance during testing.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different context variations
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Reads an optional environment variable, returning an empty string when it is not set.
 * Unlike a GitHub Action, this tool also runs locally where none of the GITHUB_* variables exist.
 */
function getOptionalEnvironmentVar(name: string): string {
  return (process.env[name] ?? '').trim();
}

/**
 * Lazily initializes the CI context. The context is only created once and reused for
 * subsequent calls.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const eventName = getOptionalEnvironmentVar('GITHUB_EVENT_NAME');

    contextInstance = Object.freeze({
      eventName,
      baseRef: getOptionalEnvironmentVar('GITHUB_BASE_REF'),
      actor: getOptionalEnvironmentVar('GITHUB_ACTOR'),
      // Covers both pull_request and pull_request_target
      isPullRequest: eventName.startsWith('pull_request'),
    });

    info(`Event Name: ${contextInstance.eventName || '(none)'}`);
    info(`Base Ref: ${contextInstance.baseRef || '(none)'}`);
    info(`Actor: ${contextInstance.actor || '(none)'}`);
    info(`Is Pull Request: ${contextInstance.isPullRequest}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};
