/**
 * Configuration types for classwright.toml parsing.
 *
 * @packageDocumentation
 */

import type { ClassFileVersion } from '../version/index.js';

/**
 * Defaults applied to builders created through the element factory.
 */
export interface BuilderConfig {
  /** Class-file version of new classes (default: RELEASE_17). */
  default_version: ClassFileVersion;
  /** Whether new classes set the SUPER bit (default: true). */
  treat_super_specially: boolean;
  /** Names of the class flags new classes start with (default: ["PUBLIC"]). */
  default_class_flags: string[];
}

/**
 * Settings for the structured logger.
 */
export interface LoggingConfig {
  /** Whether debug entries are written. */
  debug: boolean;
  /** Component name stamped on every entry. */
  component: string;
}

/**
 * Complete configuration object parsed from classwright.toml.
 */
export interface Config {
  builder: BuilderConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  builder?: Partial<BuilderConfig>;
  logging?: Partial<LoggingConfig>;
}
