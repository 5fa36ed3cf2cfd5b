/**
 * classwright
 *
 * Staged builders and structural validation for JVM class-file element
 * models: access flags, annotation values, annotations, fields, methods and
 * classes, checked against the class-file rules before they reach an encoder.
 *
 * @example
 * ```typescript
 * import { buildClassElement, flagsOf, forInt, FINAL, PUBLIC, STATIC, PrimitiveType, ReferenceType } from 'classwright';
 *
 * const constants = buildClassElement(
 *   { version: 'RELEASE_17', kind: 'interface', type: ReferenceType.of('com.example.Limits') },
 *   (limits) => {
 *     limits.field('MAX', flagsOf(PUBLIC, STATIC, FINAL), PrimitiveType.INT, {
 *       initialValue: forInt(100),
 *     });
 *   }
 * );
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './annotations/index.js';
export * from './builders/index.js';
export * from './config/index.js';
export * from './descriptors/index.js';
export * from './elements/index.js';
export * from './errors/index.js';
export * from './flags/index.js';
export * from './rules/index.js';
export * from './values/index.js';
export * from './version/index.js';
export { createElementFactory } from './factory.js';
export type { ElementFactory, FactoryClassOptions } from './factory.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
