/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - Default class flags name real class flags
 * - Kind flags and SUPER are left to the builder
 * - The logging component is a usable name
 *
 * @packageDocumentation
 */

import { findFlag, FlagSet, flagsForTarget, SUPER } from '../flags/index.js';
import { CLASS_KINDS, KIND_FLAGS } from '../rules/class-kind.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function kindOfFlag(name: string): string | undefined {
  const upper = name.toUpperCase();
  return CLASS_KINDS.find((kind) => KIND_FLAGS[kind]?.name === upper);
}

/**
 * Validates one entry of `builder.default_class_flags`.
 *
 * @param name - The flag name as written in the configuration.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validateClassFlagName(name: string, fieldPath: string, errors: ValidationError[]): void {
  const kind = kindOfFlag(name);
  if (kind !== undefined) {
    errors.push({
      field: fieldPath,
      value: name,
      message: `Flag '${name.toUpperCase()}' encodes the class kind; build a class of kind '${kind}' instead`,
    });
    return;
  }
  const flag = findFlag(name, 'class');
  if (flag === undefined) {
    const known = flagsForTarget('class').map((f) => f.name);
    errors.push({
      field: fieldPath,
      value: name,
      message: `Unknown class flag '${name}'. Class flags: ${known.join(', ')}`,
    });
    return;
  }
  if (flag.name === SUPER.name) {
    errors.push({
      field: fieldPath,
      value: name,
      message: `Flag 'SUPER' is set through 'builder.treat_super_specially'`,
    });
  }
}

/**
 * Validates the builder section.
 *
 * @param config - The configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateBuilder(config: Config, errors: ValidationError[]): void {
  const seen = new Set<string>();
  config.builder.default_class_flags.forEach((name, i) => {
    const fieldPath = `builder.default_class_flags[${String(i)}]`;
    const upper = name.toUpperCase();
    if (seen.has(upper)) {
      errors.push({
        field: fieldPath,
        value: name,
        message: `Flag '${upper}' is listed more than once`,
      });
      return;
    }
    seen.add(upper);
    validateClassFlagName(name, fieldPath, errors);
  });
}

/**
 * Validates the logging section.
 *
 * @param config - The configuration to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateLogging(config: Config, errors: ValidationError[]): void {
  const { component } = config.logging;
  if (component.trim() === '' || /\s/.test(component)) {
    errors.push({
      field: 'logging.component',
      value: component,
      message: `'logging.component' must be a non-empty name without whitespace, got '${component}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(toml));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateBuilder(config, errors);
  validateLogging(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed:\n${errorMessages}`,
      result.errors
    );
  }
}

/**
 * Resolves validated flag names to a class flag set. Names that are not
 * plain class flags are skipped; run {@link assertConfigValid} first to
 * reject them.
 *
 * @example
 * ```typescript
 * resolveClassFlags(['PUBLIC', 'final']).asInt(); // 0x11
 * ```
 */
export function resolveClassFlags(names: readonly string[]): FlagSet<'class'> {
  let flags = FlagSet.none<'class'>();
  for (const name of names) {
    const flag = findFlag(name, 'class');
    if (flag !== undefined && kindOfFlag(name) === undefined && flag.name !== SUPER.name) {
      flags = flags.plus(flag);
    }
  }
  return flags;
}
