import type { Config, EnvironmentInputMetadata } from '@/types';
import {
  DEFAULT_ALLOWED_TYPES,
  DEFAULT_MAX_COMMITS,
  DEFAULT_MAX_SUBJECT_LENGTH,
  DEFAULT_REQUIRE_SCOPE_EXCEPT_TYPES,
  TRUTHY_VALUES,
} from '@/utils/constants';

/**
 * Factory functions to reduce duplication in ENVIRONMENT_INPUTS metadata definitions.
 */
const list = (configKey: keyof Config, defaultValue = ''): EnvironmentInputMetadata => ({
  configKey,
  type: 'list',
  defaultValue,
});

const boolean = (configKey: keyof Config, defaultValue: boolean): EnvironmentInputMetadata => ({
  configKey,
  type: 'boolean',
  defaultValue: String(defaultValue),
});

const number = (configKey: keyof Config, defaultValue: number): EnvironmentInputMetadata => ({
  configKey,
  type: 'number',
  defaultValue: String(defaultValue),
});

/**
 * Complete mapping of environment variables to their config metadata.
 * This is the single source of truth for the names and defaults of every setting.
 */
export const ENVIRONMENT_INPUTS = {
  TYPES: list('allowedTypes', DEFAULT_ALLOWED_TYPES),
  SCOPES: list('allowedScopes'),
  REQUIRE_SCOPE: boolean('requireScope', false),
  REQUIRE_SCOPE_EXCEPT_TYPES: list('requireScopeExceptTypes', DEFAULT_REQUIRE_SCOPE_EXCEPT_TYPES),
  ALLOW_CAPITAL_SUBJECT: boolean('allowCapitalSubject', false),
  MAX_SUBJECT: number('maxSubjectLength', DEFAULT_MAX_SUBJECT_LENGTH),
  SKIP_FOR_BOT: boolean('skipForBot', true),
  MAX_COMMITS: number('maxCommits', DEFAULT_MAX_COMMITS),
} as const satisfies Record<string, EnvironmentInputMetadata>;

export type EnvironmentInputName = keyof typeof ENVIRONMENT_INPUTS;

/**
 * Splits a comma-separated value into trimmed, non-empty, de-duplicated tokens.
 * A blank value falls back to `defaultValue` before splitting.
 *
 * @example
 * parseListValue(' feat , fix,,feat', '') // → ['feat', 'fix']
 * parseListValue('   ', 'revert')         // → ['revert']
 */
export function parseListValue(raw: string | undefined, defaultValue: string): string[] {
  const value = raw === undefined || raw.trim() === '' ? defaultValue : raw;

  return Array.from(
    new Set(
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean),
    ),
  );
}

/**
 * Reads `true`, `yes`, `on` and `1` (any case) as true and every other non-empty value as false.
 * An unset or empty value yields `defaultValue`.
 */
export function parseBooleanValue(raw: string | undefined, defaultValue: boolean): boolean {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === '') {
    return defaultValue;
  }

  return TRUTHY_VALUES.includes(value);
}

/**
 * Parses a positive integer. Anything that is not a plain run of digits, or is zero,
 * yields `defaultValue`.
 */
export function parseNumberValue(raw: string | undefined, defaultValue: number): number {
  const value = (raw ?? '').trim();
  if (!/^\d+$/.test(value)) {
    return defaultValue;
  }

  const parsed = Number.parseInt(value, 10);
  return parsed >= 1 ? parsed : defaultValue;
}

function readList(name: EnvironmentInputName): string[] {
  return parseListValue(process.env[name], ENVIRONMENT_INPUTS[name].defaultValue);
}

// An empty allow-list means "no restriction", which the config models as null.
function readAllowList(name: EnvironmentInputName): readonly string[] | null {
  const values = readList(name);
  return values.length > 0 ? values : null;
}

function readBoolean(name: EnvironmentInputName): boolean {
  return parseBooleanValue(process.env[name], ENVIRONMENT_INPUTS[name].defaultValue === 'true');
}

function readNumber(name: EnvironmentInputName): number {
  return parseNumberValue(process.env[name], Number.parseInt(ENVIRONMENT_INPUTS[name].defaultValue, 10));
}

/**
 * Creates a frozen config object from the process environment using the ENVIRONMENT_INPUTS
 * metadata. Malformed values never throw; they resolve to the documented defaults.
 */
export function createConfigFromEnvironment(): Config {
  return Object.freeze({
    allowedTypes: readAllowList('TYPES'),
    allowedScopes: readAllowList('SCOPES'),
    requireScope: readBoolean('REQUIRE_SCOPE'),
    requireScopeExceptTypes: readList('REQUIRE_SCOPE_EXCEPT_TYPES'),
    allowCapitalSubject: readBoolean('ALLOW_CAPITAL_SUBJECT'),
    maxSubjectLength: readNumber('MAX_SUBJECT'),
    skipForBot: readBoolean('SKIP_FOR_BOT'),
    maxCommits: readNumber('MAX_COMMITS'),
  });
}
