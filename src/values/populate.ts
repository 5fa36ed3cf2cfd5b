/**
 * Population of annotation builders from host objects.
 *
 * A host annotation instance is a plain object. Its properties are mapped to
 * annotation values by an explicit {@link AnnotationSchema}: one codec per
 * declared property, visited in declaration order.
 *
 * @example
 * ```typescript
 * interface Route { path: string; methods: string[]; timeout: number }
 *
 * const RouteSchema = defineSchema<Route>(ReferenceType.of('web.Route'), {
 *   path: p.string(),
 *   methods: p.array(p.enumOf(ReferenceType.of('web.Method'))),
 *   timeout: p.int(),
 * });
 *
 * populate(builder, { path: '/', methods: ['GET'], timeout: 30 }, RouteSchema);
 * ```
 *
 * @packageDocumentation
 */

import {
  createChildAnnotationElement,
  isChildAnnotationElement,
  type ChildAnnotationElement,
} from '../annotations/types.js';
import {
  ArrayType,
  PrimitiveType,
  ReferenceType,
  VoidType,
  type ReturnType,
} from '../descriptors/index.js';
import { describeRuntimeType, ValueShapeError } from '../errors/index.js';
import { isArrayElementValue } from './render.js';
import {
  forAnnotation,
  forArray,
  forBoolean,
  forBooleanArray,
  forByte,
  forByteArray,
  forChar,
  forCharArray,
  forClass,
  forDouble,
  forDoubleArray,
  forEnum,
  forFloat,
  forFloatArray,
  forInt,
  forIntArray,
  forLong,
  forLongArray,
  forShort,
  forShortArray,
  forString,
} from './factories.js';
import type {
  AnnotationValue,
  ArrayElementValue,
  EnumConstant,
  ForAnnotation,
  ForArray,
  ForClass,
  ForEnum,
  ForString,
} from './types.js';

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

/**
 * Maps one host property value to an annotation value.
 */
export interface PropertyCodec<V extends AnnotationValue = AnnotationValue> {
  /** Description of the accepted host shape, used in errors. */
  readonly expected: string;
  /**
   * Converts a host value.
   *
   * @param value - The raw property value.
   * @param path - Dotted property path for diagnostics.
   * @throws ValueShapeError if the value does not have the accepted shape.
   */
  encode(value: unknown, path: string): V;
}

/**
 * Codecs for each property of a host annotation type `T`.
 */
export type PropertyCodecs<T> = { readonly [P in keyof T & string]-?: PropertyCodec };

/**
 * Describes how a host annotation type maps onto an annotation element.
 */
export interface AnnotationSchema<T extends object = object> {
  /** The annotation type the host objects stand for. */
  readonly type: ReferenceType;
  /** One codec per declared property, in declaration order. */
  readonly properties: PropertyCodecs<T>;
}

/**
 * Anything that accepts named annotation values.
 */
export interface AnnotationValueSink {
  value(name: string, value: AnnotationValue): unknown;
}

/**
 * Creates a schema. The type parameter checks that every property of `T` has
 * a codec.
 */
export function defineSchema<T extends object>(
  type: ReferenceType,
  properties: PropertyCodecs<T>
): AnnotationSchema<T> {
  return Object.freeze({ type, properties });
}

function codec<V extends AnnotationValue>(
  expected: string,
  encode: (value: unknown, path: string) => V
): PropertyCodec<V> {
  return Object.freeze({ expected, encode });
}

function shapeError(path: string, value: unknown, expected: string): ValueShapeError {
  return new ValueShapeError(path, describeRuntimeType(value), expected);
}

function isReturnType(value: unknown): value is ReturnType {
  return (
    value instanceof PrimitiveType ||
    value instanceof ReferenceType ||
    value instanceof ArrayType ||
    value instanceof VoidType
  );
}

function isEnumConstant(value: unknown): value is EnumConstant {
  return (
    typeof value === 'object' &&
    value !== null &&
    'declaringType' in value &&
    value.declaringType instanceof ReferenceType &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

function elementsOf(value: unknown, path: string, expected: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw shapeError(path, value, expected);
  }
  const elements: unknown[] = value;
  return elements;
}

function numberOf(value: unknown, path: string, expected: string): number {
  if (typeof value !== 'number') {
    throw shapeError(path, value, expected);
  }
  return value;
}

function integerOf(value: unknown, path: string, expected: string): number {
  const number = numberOf(value, path, expected);
  if (!Number.isInteger(number)) {
    throw shapeError(path, value, expected);
  }
  return number;
}

function primitiveArray<E, V extends AnnotationValue>(
  expected: string,
  element: (value: unknown, path: string) => E,
  create: (values: readonly E[]) => V
): PropertyCodec<V> {
  return codec(expected, (value, path) =>
    create(elementsOf(value, path, expected).map((item, i) => element(item, `${path}[${String(i)}]`)))
  );
}

/**
 * Fills `builder` with the properties of `instance`, in schema order.
 *
 * @param path - Prefix for property paths in errors; empty at the root.
 * @throws ValueShapeError naming the first property whose value has no
 * annotation value variant.
 */
export function populate<T extends object, B extends AnnotationValueSink>(
  builder: B,
  instance: T,
  schema: AnnotationSchema<T>,
  path = ''
): B {
  const codecs: Readonly<Record<string, PropertyCodec>> = schema.properties;
  for (const [name, propertyCodec] of Object.entries(codecs)) {
    const property = path === '' ? name : `${path}.${name}`;
    const raw: unknown = Reflect.get(instance, name);
    builder.value(name, propertyCodec.encode(raw, property));
  }
  return builder;
}

/**
 * Converts a host annotation instance into a nested annotation element.
 */
export function createChildAnnotation<T extends object>(
  instance: T,
  schema: AnnotationSchema<T>,
  path = ''
): ChildAnnotationElement {
  const values = new Map<string, AnnotationValue>();
  populate(
    {
      value: (name: string, value: AnnotationValue) => values.set(name, value),
    },
    instance,
    schema,
    path
  );
  return createChildAnnotationElement(schema.type, values);
}

function inferArray(values: readonly unknown[], path: string): AnnotationValue {
  if (values.length === 0) {
    return forArray([]);
  }
  const at = (i: number): string => `${path}[${String(i)}]`;
  const inferred = values.map((item, i) => {
    if (Array.isArray(item)) {
      throw shapeError(at(i), item, 'a non-array element');
    }
    return inferValue(item, at(i));
  });
  if (values.every((item) => typeof item === 'boolean')) {
    return forBooleanArray(values.filter((item): item is boolean => typeof item === 'boolean'));
  }
  if (values.every((item) => typeof item === 'bigint')) {
    return forLongArray(values.filter((item): item is bigint => typeof item === 'bigint'));
  }
  if (values.every((item) => typeof item === 'number')) {
    const numbers = values.filter((item): item is number => typeof item === 'number');
    if (!numbers.every(Number.isInteger)) {
      return forDoubleArray(numbers);
    }
    return numbers.every((n) => n >= INT_MIN && n <= INT_MAX)
      ? forIntArray(numbers)
      : forLongArray(numbers);
  }
  // Primitives take the dedicated arrays above.
  const kinds = new Set(inferred.map((value) => value.kind));
  const elements = inferred.filter(isArrayElementValue);
  if (kinds.size === 1 && elements.length === inferred.length) {
    return forArray(elements);
  }
  throw new ValueShapeError(path, 'Array', 'a homogeneous array');
}

function inferValue(value: unknown, path: string): AnnotationValue {
  switch (typeof value) {
    case 'string':
      return forString(value);
    case 'boolean':
      return forBoolean(value);
    case 'bigint':
      return forLong(value);
    case 'number':
      if (!Number.isInteger(value)) {
        return forDouble(value);
      }
      return value >= INT_MIN && value <= INT_MAX ? forInt(value) : forLong(value);
    default:
      break;
  }
  if (isReturnType(value)) {
    return forClass(value);
  }
  if (isEnumConstant(value)) {
    return forEnum(value.declaringType, value.name);
  }
  if (isChildAnnotationElement(value)) {
    return forAnnotation(value);
  }
  if (Array.isArray(value)) {
    const elements: unknown[] = value;
    return inferArray(elements, path);
  }
  throw shapeError(path, value, 'a value with an annotation value variant');
}

/**
 * Property codecs.
 *
 * Integral codecs reject non-integers as a shape error; out-of-range integers
 * fail with `INVALID_VALUE` from the value constructors.
 */
export const p = {
  string: (): PropertyCodec<ForString> =>
    codec('string', (value, path) => {
      if (typeof value !== 'string') {
        throw shapeError(path, value, 'string');
      }
      return forString(value);
    }),

  boolean: () =>
    codec('boolean', (value, path) => {
      if (typeof value !== 'boolean') {
        throw shapeError(path, value, 'boolean');
      }
      return forBoolean(value);
    }),

  char: () =>
    codec('char', (value, path) => {
      if (typeof value !== 'string') {
        throw shapeError(path, value, 'char');
      }
      return forChar(value);
    }),

  byte: () => codec('byte', (value, path) => forByte(integerOf(value, path, 'byte'))),

  short: () => codec('short', (value, path) => forShort(integerOf(value, path, 'short'))),

  int: () => codec('int', (value, path) => forInt(integerOf(value, path, 'int'))),

  long: () =>
    codec('long', (value, path) =>
      forLong(typeof value === 'bigint' ? value : integerOf(value, path, 'long'))
    ),

  float: () => codec('float', (value, path) => forFloat(numberOf(value, path, 'float'))),

  double: () => codec('double', (value, path) => forDouble(numberOf(value, path, 'double'))),

  classRef: (): PropertyCodec<ForClass> =>
    codec('class', (value, path) => {
      if (!isReturnType(value)) {
        throw shapeError(path, value, 'class');
      }
      return forClass(value);
    }),

  /**
   * Accepts a constant name, or an {@link EnumConstant} declared by `type`.
   */
  enumOf: (type: ReferenceType): PropertyCodec<ForEnum> => {
    const expected = `enum ${type.asString()}`;
    return codec(expected, (value, path) => {
      if (typeof value === 'string') {
        return forEnum(type, value);
      }
      if (isEnumConstant(value) && value.declaringType.equals(type)) {
        return forEnum(type, value.name);
      }
      throw shapeError(path, value, expected);
    });
  },

  /**
   * Accepts a host instance of `schema` or an already built nested element.
   */
  annotation: <T extends object>(schema: AnnotationSchema<T>): PropertyCodec<ForAnnotation> => {
    const expected = `annotation ${schema.type.asString()}`;
    return codec(expected, (value, path) => {
      if (isChildAnnotationElement(value)) {
        if (!value.type.equals(schema.type)) {
          throw new ValueShapeError(path, `@${value.type.asString()}`, expected);
        }
        return forAnnotation(value);
      }
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw shapeError(path, value, expected);
      }
      const nested: object = value;
      return forAnnotation(createChildAnnotation<object>(nested, schema, path));
    });
  },

  array: (element: PropertyCodec<ArrayElementValue>): PropertyCodec<ForArray> => {
    const expected = `${element.expected}[]`;
    return codec(expected, (value, path) =>
      forArray(
        elementsOf(value, path, expected).map((item, i) =>
          element.encode(item, `${path}[${String(i)}]`)
        )
      )
    );
  },

  booleanArray: () =>
    primitiveArray(
      'boolean[]',
      (value, path) => {
        if (typeof value !== 'boolean') {
          throw shapeError(path, value, 'boolean');
        }
        return value;
      },
      forBooleanArray
    ),

  charArray: () =>
    primitiveArray(
      'char[]',
      (value, path) => {
        if (typeof value !== 'string') {
          throw shapeError(path, value, 'char');
        }
        return value;
      },
      forCharArray
    ),

  byteArray: () =>
    primitiveArray('byte[]', (value, path) => integerOf(value, path, 'byte'), forByteArray),

  shortArray: () =>
    primitiveArray('short[]', (value, path) => integerOf(value, path, 'short'), forShortArray),

  intArray: () =>
    primitiveArray('int[]', (value, path) => integerOf(value, path, 'int'), forIntArray),

  longArray: () =>
    primitiveArray(
      'long[]',
      (value, path): bigint | number =>
        typeof value === 'bigint' ? value : integerOf(value, path, 'long'),
      forLongArray
    ),

  floatArray: () =>
    primitiveArray('float[]', (value, path) => numberOf(value, path, 'float'), forFloatArray),

  doubleArray: () =>
    primitiveArray('double[]', (value, path) => numberOf(value, path, 'double'), forDoubleArray),

  /**
   * Picks the variant from the runtime shape: strings, booleans, integral
   * numbers (int, or long past the int range), other numbers (double),
   * bigints (long), types (class), enum constants, nested annotation
   * elements, and homogeneous arrays of those.
   */
  inferred: (): PropertyCodec => codec('a value with an annotation value variant', inferValue),
} as const;
