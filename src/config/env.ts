/**
 * Environment variable overrides for configuration.
 *
 * Provides support for CLASSWRIGHT_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { parseClassFileVersion, type ClassFileVersion } from '../version/index.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a version tag or release number.
 *
 * @throws EnvCoercionError if the value names no supported version.
 */
function coerceToVersion(value: string, envVar: string): ClassFileVersion {
  const version = parseClassFileVersion(value);
  if (version === undefined) {
    throw new EnvCoercionError(envVar, value, 'class-file version');
  }
  return version;
}

/**
 * Splits a comma-separated list, dropping blank entries.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

type EnvValueType = 'string' | 'boolean' | 'version' | 'list';

interface EnvMapping {
  readonly type: EnvValueType;
  readonly description: string;
  apply(overrides: PartialConfig, value: string, envVar: string): void;
}

function builderSetting(
  type: EnvValueType,
  description: string,
  assign: (builder: NonNullable<PartialConfig['builder']>, value: string, envVar: string) => void
): EnvMapping {
  return {
    type,
    description,
    apply: (overrides, value, envVar) => {
      overrides.builder ??= {};
      assign(overrides.builder, value, envVar);
    },
  };
}

function loggingSetting(
  type: EnvValueType,
  description: string,
  assign: (logging: NonNullable<PartialConfig['logging']>, value: string, envVar: string) => void
): EnvMapping {
  return {
    type,
    description,
    apply: (overrides, value, envVar) => {
      overrides.logging ??= {};
      assign(overrides.logging, value, envVar);
    },
  };
}

const versionSetting = (description: string): EnvMapping =>
  builderSetting('version', description, (builder, value, envVar) => {
    builder.default_version = coerceToVersion(value, envVar);
  });

const debugSetting = (description: string): EnvMapping =>
  loggingSetting('boolean', description, (logging, value, envVar) => {
    logging.debug = coerceToBoolean(value, envVar);
  });

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: CLASSWRIGHT_<SECTION>_<FIELD> maps to config.<section>.<field>
 * For convenience, some shortcuts are provided (e.g., CLASSWRIGHT_VERSION).
 * Later entries win when a shortcut and its full form are both set.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  CLASSWRIGHT_VERSION: versionSetting(
    'Override the default class-file version (shortcut for CLASSWRIGHT_BUILDER_DEFAULT_VERSION)'
  ),
  CLASSWRIGHT_DEBUG: debugSetting(
    'Enable debug logging (shortcut for CLASSWRIGHT_LOGGING_DEBUG)'
  ),

  // Builder settings
  CLASSWRIGHT_BUILDER_DEFAULT_VERSION: versionSetting(
    'Override the default class-file version (tag or release number)'
  ),
  CLASSWRIGHT_BUILDER_TREAT_SUPER_SPECIALLY: builderSetting(
    'boolean',
    'Whether new classes set the SUPER bit (true/false)',
    (builder, value, envVar) => {
      builder.treat_super_specially = coerceToBoolean(value, envVar);
    }
  ),
  CLASSWRIGHT_BUILDER_DEFAULT_CLASS_FLAGS: builderSetting(
    'list',
    'Comma-separated class flags new classes start with',
    (builder, value) => {
      builder.default_class_flags = coerceToList(value);
    }
  ),

  // Logging settings
  CLASSWRIGHT_LOGGING_DEBUG: debugSetting('Enable debug logging (true/false)'),
  CLASSWRIGHT_LOGGING_COMPONENT: loggingSetting(
    'string',
    'Override the component name stamped on log entries',
    (logging, value) => {
      logging.component = value;
    }
  ),
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for CLASSWRIGHT_* environment variables and returns a partial
 * configuration object with the values to override.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 * throwing the first one.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ CLASSWRIGHT_VERSION: '11' });
 * console.log(result.overrides.builder?.default_version); // "RELEASE_11"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    builder: {
      ...base.builder,
      ...partial.builder,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Override precedence: env > config
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // CLASSWRIGHT_DEBUG=1 turns on debug logging regardless of the file
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
