/**
 * Type descriptors used as opaque identities by the element core.
 *
 * @packageDocumentation
 */

export {
  ArrayType,
  isTypeDescriptor,
  MethodType,
  PrimitiveType,
  ReferenceType,
  VoidType,
} from './types.js';
export type { FieldType, PrimitiveName, ReturnType, TypeDescriptor } from './types.js';
