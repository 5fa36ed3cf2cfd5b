/**
 * The annotation value model.
 *
 * A closed union of every literal, class, enum, nested-annotation and array
 * value that may appear as an annotation property or an annotation-property
 * default.
 *
 * @packageDocumentation
 */

import type { ChildAnnotationElement } from '../annotations/types.js';
import type { ReferenceType, ReturnType } from '../descriptors/index.js';

export interface ForString {
  readonly kind: 'String';
  readonly value: string;
}

export interface ForBoolean {
  readonly kind: 'Boolean';
  readonly value: boolean;
}

/** A single UTF-16 code unit. */
export interface ForChar {
  readonly kind: 'Char';
  readonly value: string;
}

export interface ForByte {
  readonly kind: 'Byte';
  readonly value: number;
}

export interface ForShort {
  readonly kind: 'Short';
  readonly value: number;
}

export interface ForInt {
  readonly kind: 'Int';
  readonly value: number;
}

export interface ForLong {
  readonly kind: 'Long';
  readonly value: bigint;
}

/** Holds a value already rounded to single precision. */
export interface ForFloat {
  readonly kind: 'Float';
  readonly value: number;
}

export interface ForDouble {
  readonly kind: 'Double';
  readonly value: number;
}

/** A class literal, e.g. `String.class` or `int.class`. */
export interface ForClass {
  readonly kind: 'Class';
  readonly value: ReturnType;
}

/**
 * An enum constant, stored by declaring type and constant name so that the
 * value survives reordering of the enum.
 */
export interface ForEnum {
  readonly kind: 'Enum';
  readonly type: ReferenceType;
  readonly entryName: string;
}

export interface ForAnnotation {
  readonly kind: 'Annotation';
  readonly value: ChildAnnotationElement;
}

/**
 * Values allowed inside a {@link ForArray}: every non-array variant. Arrays
 * never nest.
 */
export type ArrayElementValue =
  | ForString
  | ForBoolean
  | ForChar
  | ForByte
  | ForShort
  | ForInt
  | ForLong
  | ForFloat
  | ForDouble
  | ForClass
  | ForEnum
  | ForAnnotation;

export interface ForArray {
  readonly kind: 'Array';
  readonly values: readonly ArrayElementValue[];
}

export interface ForBooleanArray {
  readonly kind: 'BooleanArray';
  readonly values: readonly boolean[];
}

export interface ForCharArray {
  readonly kind: 'CharArray';
  readonly values: readonly string[];
}

export interface ForByteArray {
  readonly kind: 'ByteArray';
  readonly values: readonly number[];
}

export interface ForShortArray {
  readonly kind: 'ShortArray';
  readonly values: readonly number[];
}

export interface ForIntArray {
  readonly kind: 'IntArray';
  readonly values: readonly number[];
}

export interface ForLongArray {
  readonly kind: 'LongArray';
  readonly values: readonly bigint[];
}

export interface ForFloatArray {
  readonly kind: 'FloatArray';
  readonly values: readonly number[];
}

export interface ForDoubleArray {
  readonly kind: 'DoubleArray';
  readonly values: readonly number[];
}

/**
 * Every annotation value variant.
 */
export type AnnotationValue =
  | ForString
  | ForBoolean
  | ForChar
  | ForByte
  | ForShort
  | ForInt
  | ForLong
  | ForFloat
  | ForDouble
  | ForClass
  | ForEnum
  | ForAnnotation
  | ForArray
  | ForBooleanArray
  | ForCharArray
  | ForByteArray
  | ForShortArray
  | ForIntArray
  | ForLongArray
  | ForFloatArray
  | ForDoubleArray;

/**
 * Discriminants of {@link AnnotationValue}.
 */
export type AnnotationValueKind = AnnotationValue['kind'];

/**
 * Values legal as an annotation-property default. The class-file format
 * accepts every element value there, so this is the full union; it is kept as
 * its own name so signatures state which role a value plays.
 */
export type DefaultValue = AnnotationValue;

/**
 * An enum constant in the host program: the declaring enum type and the
 * constant's name.
 */
export interface EnumConstant {
  readonly declaringType: ReferenceType;
  readonly name: string;
}
