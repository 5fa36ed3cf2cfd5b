/**
 * Configuration module for classwright.toml parsing and validation.
 *
 * Provides typed configuration parsing with sensible defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, loadConfig, parseConfig } from './parser.js';
export type { LoadConfigOptions } from './parser.js';
export type { BuilderConfig, Config, LoggingConfig, PartialConfig } from './types.js';
export { DEFAULT_BUILDER, DEFAULT_CONFIG, DEFAULT_LOGGING } from './defaults.js';
export {
  assertConfigValid,
  ConfigValidationError,
  resolveClassFlags,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  applyEnvOverrides,
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
