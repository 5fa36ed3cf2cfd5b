/**
 * Canonical text rendering of annotation values, and subset guards.
 *
 * @packageDocumentation
 */

import type { ChildAnnotationElement } from '../annotations/types.js';
import type { AnnotationValue, ArrayElementValue, DefaultValue } from './types.js';

/**
 * Shortest decimal that reads back to the same single-precision value.
 */
function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return formatDouble(candidate);
    }
  }
  return formatDouble(value);
}

function formatDouble(value: number): string {
  if (Number.isFinite(value) && Number.isInteger(value) && Math.abs(value) < 1e21) {
    // -0 prints as "0" otherwise
    return `${Object.is(value, -0) ? '-0' : String(value)}.0`;
  }
  return String(value);
}

function join<T>(items: readonly T[], render: (item: T) => string): string {
  return `[${items.map(render).join(', ')}]`;
}

/**
 * Renders a nested annotation as `@pkg.Type(name = value, ...)`.
 */
export function renderAnnotation(element: ChildAnnotationElement): string {
  const type = `@${element.type.asString()}`;
  if (element.values.size === 0) {
    return type;
  }
  const entries = [...element.values].map(([name, value]) => `${name} = ${renderValue(value)}`);
  return `${type}(${entries.join(', ')})`;
}

/**
 * Renders a value in its canonical diagnostic form.
 *
 * @example
 * ```typescript
 * renderValue(forString('x'));         // "\"x\""
 * renderValue(forLong(5n));            // "5L"
 * renderValue(forFloat(1.5));          // "1.5F"
 * renderValue(forIntArray([1, 2]));    // "[1, 2]"
 * ```
 */
export function renderValue(value: AnnotationValue): string {
  switch (value.kind) {
    case 'String':
      return `"${value.value}"`;
    case 'Boolean':
      return String(value.value);
    case 'Char':
      return `'${value.value}'`;
    case 'Byte':
      return `${String(value.value)}B`;
    case 'Short':
      return `${String(value.value)}S`;
    case 'Int':
      return String(value.value);
    case 'Long':
      return `${value.value.toString()}L`;
    case 'Float':
      return `${formatFloat(value.value)}F`;
    case 'Double':
      return `${formatDouble(value.value)}D`;
    case 'Class':
      return value.value.asString();
    case 'Enum':
      return `${value.type.asString()}.${value.entryName}`;
    case 'Annotation':
      return renderAnnotation(value.value);
    case 'Array':
      return join(value.values, renderValue);
    case 'BooleanArray':
      return join(value.values, String);
    case 'CharArray':
      return join(value.values, (c) => `'${c}'`);
    case 'ByteArray':
      return join(value.values, (b) => `${String(b)}B`);
    case 'ShortArray':
      return join(value.values, (s) => `${String(s)}S`);
    case 'IntArray':
      return join(value.values, String);
    case 'LongArray':
      return join(value.values, (l) => `${l.toString()}L`);
    case 'FloatArray':
      return join(value.values, (f) => `${formatFloat(f)}F`);
    case 'DoubleArray':
      return join(value.values, (d) => `${formatDouble(d)}D`);
    default: {
      const _exhaustive: never = value;
      throw new Error(`Unknown annotation value kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Whether a value may appear inside a heterogeneous array.
 */
export function isArrayElementValue(value: AnnotationValue): value is ArrayElementValue {
  switch (value.kind) {
    case 'Array':
    case 'BooleanArray':
    case 'CharArray':
    case 'ByteArray':
    case 'ShortArray':
    case 'IntArray':
    case 'LongArray':
    case 'FloatArray':
    case 'DoubleArray':
      return false;
    default:
      return true;
  }
}

/**
 * Whether a value may be used as an annotation-property default. Every
 * variant qualifies.
 */
export function isDefaultValue(value: AnnotationValue): value is DefaultValue {
  return true;
}
