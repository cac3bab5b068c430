import type { Config } from './config.types';

/**
 * Kinds of values an environment input can be parsed into.
 */
export type EnvironmentInputType = 'list' | 'boolean' | 'number';

/**
 * Metadata describing how a single environment variable maps onto the config.
 */
export interface EnvironmentInputMetadata {
  /** The config property this variable populates. */
  configKey: keyof Config;
  /** How the raw value is parsed. */
  type: EnvironmentInputType;
  /** Raw default applied when the variable is unset or blank. */
  defaultValue: string;
}
