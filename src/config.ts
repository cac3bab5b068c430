import type { Config } from '@/types';
import { createConfigFromEnvironment, ENVIRONMENT_INPUTS } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so the next `getConfig()` call reads the (stubbed) environment again.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Renders a resolved config value for the log.
 */
function describeValue(value: Config[keyof Config]): string {
  if (value === null) {
    return '(unrestricted)';
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(', ') : '(none)';
  }

  return String(value);
}

/**
 * Lazy-initialized configuration object, read from the environment once per process.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    configInstance = createConfigFromEnvironment();

    for (const [name, { configKey, type }] of Object.entries(ENVIRONMENT_INPUTS)) {
      info(`${configKey} [${name}, ${type}]: ${describeValue(configInstance[configKey])}`);
    }

    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}
