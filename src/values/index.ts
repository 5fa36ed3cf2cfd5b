/**
 * Annotation value model: variants, checked constructors, rendering and
 * population from host objects.
 *
 * @packageDocumentation
 */

export * from './factories.js';
export { isArrayElementValue, isDefaultValue, renderAnnotation, renderValue } from './render.js';
export { createChildAnnotation, defineSchema, p, populate } from './populate.js';
export type {
  AnnotationSchema,
  AnnotationValueSink,
  PropertyCodec,
  PropertyCodecs,
} from './populate.js';
export type {
  AnnotationValue,
  AnnotationValueKind,
  ArrayElementValue,
  DefaultValue,
  EnumConstant,
  ForAnnotation,
  ForArray,
  ForBoolean,
  ForBooleanArray,
  ForByte,
  ForByteArray,
  ForChar,
  ForCharArray,
  ForClass,
  ForDouble,
  ForDoubleArray,
  ForEnum,
  ForFloat,
  ForFloatArray,
  ForInt,
  ForIntArray,
  ForLong,
  ForLongArray,
  ForShort,
  ForShortArray,
  ForString,
} from './types.js';
