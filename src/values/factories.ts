/**
 * Checked constructors for annotation values.
 *
 * @packageDocumentation
 */

import type { ChildAnnotationElement } from '../annotations/types.js';
import type { ReferenceType, ReturnType } from '../descriptors/index.js';
import { ElementError } from '../errors/index.js';
import type {
  ArrayElementValue,
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

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

function invalid(kind: string, value: unknown, reason: string): ElementError {
  const shown = typeof value === 'bigint' ? `${value.toString()}n` : String(value);
  return new ElementError(`Invalid ${kind} value ${shown}: ${reason}`, 'INVALID_VALUE', shown);
}

function checkIntegral(kind: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw invalid(kind, value, `expected an integer between ${String(min)} and ${String(max)}`);
  }
  return value;
}

function checkChar(value: string): string {
  if (value.length !== 1) {
    throw invalid('char', value, 'expected exactly one UTF-16 code unit');
  }
  return value;
}

function toLong(value: bigint | number): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw invalid('long', value, 'expected a safe integer or a bigint');
  }
  const long = BigInt(value);
  if (long < LONG_MIN || long > LONG_MAX) {
    throw invalid('long', value, 'outside the signed 64-bit range');
  }
  return long;
}

export const checkByte = (value: number): number => checkIntegral('byte', value, -128, 127);
export const checkShort = (value: number): number => checkIntegral('short', value, -32768, 32767);
export const checkInt = (value: number): number =>
  checkIntegral('int', value, -2147483648, 2147483647);

// -- Scalars --

export function forString(value: string): ForString {
  return { kind: 'String', value };
}

export function forBoolean(value: boolean): ForBoolean {
  return { kind: 'Boolean', value };
}

export function forChar(value: string): ForChar {
  return { kind: 'Char', value: checkChar(value) };
}

export function forByte(value: number): ForByte {
  return { kind: 'Byte', value: checkByte(value) };
}

export function forShort(value: number): ForShort {
  return { kind: 'Short', value: checkShort(value) };
}

export function forInt(value: number): ForInt {
  return { kind: 'Int', value: checkInt(value) };
}

/**
 * Accepts a bigint, or a number that is a safe integer.
 */
export function forLong(value: bigint | number): ForLong {
  return { kind: 'Long', value: toLong(value) };
}

/**
 * Rounds `value` to single precision.
 */
export function forFloat(value: number): ForFloat {
  return { kind: 'Float', value: Math.fround(value) };
}

export function forDouble(value: number): ForDouble {
  return { kind: 'Double', value };
}

export function forClass(value: ReturnType): ForClass {
  return { kind: 'Class', value };
}

export function forEnum(type: ReferenceType, entryName: string): ForEnum {
  if (entryName.length === 0) {
    throw invalid('enum', entryName, `empty constant name for ${type.asString()}`);
  }
  return { kind: 'Enum', type, entryName };
}

/**
 * Enum value from a host enum constant.
 */
export function forEnumConstant(constant: EnumConstant): ForEnum {
  return forEnum(constant.declaringType, constant.name);
}

export function forAnnotation(value: ChildAnnotationElement): ForAnnotation {
  return { kind: 'Annotation', value };
}

// -- Arrays --

export function forArray(values: readonly ArrayElementValue[]): ForArray {
  return { kind: 'Array', values: [...values] };
}

export function forStringArray(values: readonly string[]): ForArray {
  return forArray(values.map(forString));
}

export function forClassArray(values: readonly ReturnType[]): ForArray {
  return forArray(values.map(forClass));
}

export function forEnumArray(values: readonly EnumConstant[]): ForArray {
  return forArray(values.map(forEnumConstant));
}

export function forAnnotationArray(values: readonly ChildAnnotationElement[]): ForArray {
  return forArray(values.map(forAnnotation));
}

export function forBooleanArray(values: readonly boolean[]): ForBooleanArray {
  return { kind: 'BooleanArray', values: [...values] };
}

export function forCharArray(values: readonly string[]): ForCharArray {
  return { kind: 'CharArray', values: values.map(checkChar) };
}

export function forByteArray(values: readonly number[]): ForByteArray {
  return { kind: 'ByteArray', values: values.map(checkByte) };
}

export function forShortArray(values: readonly number[]): ForShortArray {
  return { kind: 'ShortArray', values: values.map(checkShort) };
}

export function forIntArray(values: readonly number[]): ForIntArray {
  return { kind: 'IntArray', values: values.map(checkInt) };
}

export function forLongArray(values: readonly (bigint | number)[]): ForLongArray {
  return { kind: 'LongArray', values: values.map(toLong) };
}

export function forFloatArray(values: readonly number[]): ForFloatArray {
  return { kind: 'FloatArray', values: values.map((value) => Math.fround(value)) };
}

export function forDoubleArray(values: readonly number[]): ForDoubleArray {
  return { kind: 'DoubleArray', values: [...values] };
}
