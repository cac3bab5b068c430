import type { Context } from '@/types';
import { vi } from 'vitest';

/**
 * Default context values: a push run by a human on a developer machine.
 */
const defaultContext: Context = Object.freeze({
  eventName: 'push',
  baseRef: '',
  actor: 'octocat',
  isPullRequest: false,
});

// Store the current context configuration
let currentContext: Context = defaultContext;

/**
 * Handle used by tests to adjust the context returned by `getContext()`.
 */
export const context = {
  set(overrides: Partial<Context>): void {
    currentContext = Object.freeze({ ...currentContext, ...overrides });
  },
  reset(): void {
    currentContext = defaultContext;
  },
};

export const getContext = vi.fn((): Context => currentContext);

export const clearContextForTesting = vi.fn((): void => {});
