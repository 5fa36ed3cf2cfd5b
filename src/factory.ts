/**
 * Builders pre-filled from configuration.
 *
 * @packageDocumentation
 */

import {
  ClassElementBuilder,
  type ClassElementOptions,
} from './builders/class-builder.js';
import { assertConfigValid, getDefaultConfig, resolveClassFlags, type Config } from './config/index.js';
import type { ClassElement } from './elements/types.js';
import type { FlagSet } from './flags/index.js';
import { Logger } from './utils/logger.js';

/**
 * Class options accepted by the factory. Version, flags and super treatment
 * fall back to the configured defaults.
 */
export type FactoryClassOptions = Omit<ClassElementOptions, 'version' | 'logger'> &
  Partial<Pick<ClassElementOptions, 'version'>>;

export interface ElementFactory {
  readonly config: Config;
  /** Logger handed to every builder the factory creates. */
  readonly logger: Logger;
  /** Class flags resolved from `builder.default_class_flags`. */
  readonly defaultClassFlags: FlagSet<'class'>;
  /**
   * Creates a class builder with the configured defaults.
   *
   * @throws ClassValidationError if the initial state breaks the state rules.
   */
  classBuilder(options: FactoryClassOptions): ClassElementBuilder;
  /**
   * Creates a class builder, runs `block` exactly once and builds.
   */
  buildClass(options: FactoryClassOptions, block?: (builder: ClassElementBuilder) => void): ClassElement;
}

/**
 * Creates an element factory from validated configuration.
 *
 * @throws ConfigValidationError if the configuration fails semantic validation.
 *
 * @example
 * ```typescript
 * const factory = createElementFactory(await loadConfig('classwright.toml'));
 * const point = factory.buildClass(
 *   { kind: 'record', type: ReferenceType.of('com.example.Point'), supertype: ReferenceType.RECORD },
 *   (builder) => builder.field('x', flagsOf(PRIVATE, FINAL), PrimitiveType.INT)
 * );
 * ```
 */
export function createElementFactory(config: Config = getDefaultConfig()): ElementFactory {
  assertConfigValid(config);
  const logger = new Logger({
    component: config.logging.component,
    debugMode: config.logging.debug,
  });
  const defaultClassFlags = resolveClassFlags(config.builder.default_class_flags);

  const classBuilder = (options: FactoryClassOptions): ClassElementBuilder =>
    new ClassElementBuilder({
      ...options,
      version: options.version ?? config.builder.default_version,
      flags: options.flags ?? defaultClassFlags,
      treatSuperSpecially: options.treatSuperSpecially ?? config.builder.treat_super_specially,
      logger,
    });

  return {
    config,
    logger,
    defaultClassFlags,
    classBuilder,
    buildClass: (options, block) => {
      const builder = classBuilder(options);
      block?.(builder);
      return builder.build();
    },
  };
}
