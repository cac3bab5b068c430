import type { Config } from '@/types';
import { vi } from 'vitest';

/**
 * Config mock with added utility methods
 */
interface ConfigMock {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object, matching the environment defaults.
 */
export const defaultConfig: Config = Object.freeze({
  allowedTypes: ['feat', 'fix', 'docs', 'style', 'refactor', 'perf', 'test', 'build', 'ci', 'chore', 'revert'],
  allowedScopes: null,
  requireScope: false,
  requireScopeExceptTypes: ['revert'],
  allowCapitalSubject: false,
  maxSubjectLength: 72,
  skipForBot: true,
  maxCommits: 200,
});

// Store the actual configuration data
let currentConfig: Config = defaultConfig;

/**
 * Handle used by tests to adjust the config returned by `getConfig()`.
 */
export const config: ConfigMock = {
  set(overrides: Partial<Config>): void {
    // Note: No need for deep merge
    currentConfig = Object.freeze({ ...currentConfig, ...overrides });
  },
  resetDefaults(): void {
    currentConfig = defaultConfig;
  },
};

/**
 * Returns the current configuration.
 */
export const getConfig = vi.fn((): Config => currentConfig);

export const clearConfigForTesting = vi.fn((): void => {});
