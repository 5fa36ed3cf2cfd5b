/**
 * Default configuration values for classwright.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_CLASS_FILE_VERSION } from '../version/index.js';
import type { BuilderConfig, Config, LoggingConfig } from './types.js';

/**
 * Default builder settings: public classes targeting the default class-file
 * version with the SUPER bit set.
 */
export const DEFAULT_BUILDER: BuilderConfig = {
  default_version: DEFAULT_CLASS_FILE_VERSION,
  treat_super_specially: true,
  default_class_flags: ['PUBLIC'],
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
  component: 'classwright',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  builder: DEFAULT_BUILDER,
  logging: DEFAULT_LOGGING,
};
