/**
 * TOML configuration parser for classwright.toml.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import { parseClassFileVersion, type ClassFileVersion } from '../version/index.js';
import { DEFAULT_BUILDER, DEFAULT_LOGGING } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import type { BuilderConfig, Config, LoggingConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any; exposed as `error.cause`.
   */
  constructor(message: string, cause?: Error) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigParseError';
  }
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value instanceof Date ? 'datetime' : typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${describeType(value)}`
    );
  }
  return value.map((item: unknown, i) => validateString(item, `${fieldPath}[${String(i)}]`));
}

/**
 * Validates a version given as a tag (`"RELEASE_11"`), a release string
 * (`"11"`, `"1.8"`) or an integer release (`11`).
 *
 * @throws ConfigParseError if the value names no supported version.
 */
function validateVersion(value: unknown, fieldPath: string): ClassFileVersion {
  if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'bigint') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected version string or number, got ${describeType(value)}`
    );
  }
  const version = parseClassFileVersion(String(value));
  if (version === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': unsupported class-file version '${String(value)}'`
    );
  }
  return version;
}

/**
 * Reads an optional section table.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const raw = parsed[name];
  if (raw === undefined) {
    return undefined;
  }
  if (!isTable(raw)) {
    throw new ConfigParseError(
      `Invalid type for '${name}': expected table, got ${describeType(raw)}`
    );
  }
  return raw;
}

/**
 * Parses builder settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the builder section.
 * @returns Validated builder settings merged with defaults.
 */
function parseBuilder(raw: Record<string, unknown> | undefined): BuilderConfig {
  const result: BuilderConfig = {
    ...DEFAULT_BUILDER,
    default_class_flags: [...DEFAULT_BUILDER.default_class_flags],
  };
  if (raw === undefined) {
    return result;
  }

  if ('default_version' in raw) {
    result.default_version = validateVersion(raw.default_version, 'builder.default_version');
  }
  if ('treat_super_specially' in raw) {
    result.treat_super_specially = validateBoolean(
      raw.treat_super_specially,
      'builder.treat_super_specially'
    );
  }
  if ('default_class_flags' in raw) {
    result.default_class_flags = validateStringArray(
      raw.default_class_flags,
      'builder.default_class_flags'
    );
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated logging settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  if ('component' in raw) {
    result.component = validateString(raw.component, 'logging.component');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [builder]
 * default_version = "RELEASE_11"
 * default_class_flags = ["PUBLIC", "FINAL"]
 * `);
 * console.log(config.builder.default_version); // "RELEASE_11"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    builder: parseBuilder(section(parsed, 'builder')),
    logging: parseLogging(section(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.logging.component); // "classwright"
 * ```
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord | undefined;
}

/**
 * Reads and parses a configuration file, then applies environment
 * overrides. A missing file yields the defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @throws ConfigParseError if the file cannot be read or parsed.
 */
export async function loadConfig(path: string, options: LoadConfigOptions = {}): Promise<Config> {
  let content = '';
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (!isMissingFile(error)) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Cannot read config file '${path}': ${cause.message}`, cause);
    }
  }
  const config = parseConfig(content);
  return options.env === undefined ? applyEnvOverrides(config) : applyEnvOverrides(config, options.env);
}
