import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { createChildAnnotationElement } from '../annotations/types.js';
import { ArrayType, PrimitiveType, ReferenceType } from '../descriptors/index.js';
import {
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
  forStringArray,
  isArrayElementValue,
  isDefaultValue,
  renderAnnotation,
  renderValue,
} from './index.js';

const COLOR = ReferenceType.of('com.example.Color');
const TAG = ReferenceType.of('com.example.Tag');

describe('renderValue', () => {
  it('should render scalars with their suffixes', () => {
    expect(renderValue(forString('text'))).toBe('"text"');
    expect(renderValue(forBoolean(true))).toBe('true');
    expect(renderValue(forChar('c'))).toBe("'c'");
    expect(renderValue(forByte(5))).toBe('5B');
    expect(renderValue(forShort(5))).toBe('5S');
    expect(renderValue(forInt(5))).toBe('5');
    expect(renderValue(forLong(5n))).toBe('5L');
    expect(renderValue(forFloat(1.5))).toBe('1.5F');
    expect(renderValue(forDouble(1.5))).toBe('1.5D');
  });

  it('should render integral floating values with a fraction', () => {
    expect(renderValue(forFloat(3))).toBe('3.0F');
    expect(renderValue(forDouble(2))).toBe('2.0D');
    expect(renderValue(forDouble(-0))).toBe('-0.0D');
  });

  it('should render floats by their shortest decimal', () => {
    expect(renderValue(forFloat(0.1))).toBe('0.1F');
  });

  it('should render non-finite values', () => {
    expect(renderValue(forFloat(Number.POSITIVE_INFINITY))).toBe('InfinityF');
    expect(renderValue(forDouble(Number.NaN))).toBe('NaND');
  });

  it('should render floats that read back to the same single-precision value', () => {
    fc.assert(
      fc.property(fc.float({ noNaN: true, noDefaultInfinity: true }), (value) => {
        const rendered = renderValue(forFloat(value));
        expect(rendered.endsWith('F')).toBe(true);
        expect(Math.fround(Number(rendered.slice(0, -1))) === Math.fround(value)).toBe(true);
      })
    );
  });

  it('should render types, enums and annotations', () => {
    expect(renderValue(forClass(ReferenceType.STRING))).toBe('java.lang.String');
    expect(renderValue(forClass(new ArrayType(PrimitiveType.INT)))).toBe('int[]');
    expect(renderValue(forEnum(COLOR, 'RED'))).toBe('com.example.Color.RED');

    const tag = createChildAnnotationElement(TAG, [
      ['name', forString('a')],
      ['size', forInt(2)],
    ]);
    expect(renderValue({ kind: 'Annotation', value: tag })).toBe(
      '@com.example.Tag(name = "a", size = 2)'
    );
  });

  it('should render arrays element by element', () => {
    expect(renderValue(forStringArray(['a', 'b']))).toBe('["a", "b"]');
    expect(renderValue(forArray([]))).toBe('[]');
    expect(renderValue(forBooleanArray([true, false]))).toBe('[true, false]');
    expect(renderValue(forCharArray(['a', 'b']))).toBe("['a', 'b']");
    expect(renderValue(forByteArray([1, -1]))).toBe('[1B, -1B]');
    expect(renderValue(forShortArray([7]))).toBe('[7S]');
    expect(renderValue(forIntArray([1, 2]))).toBe('[1, 2]');
    expect(renderValue(forLongArray([1n, 2]))).toBe('[1L, 2L]');
    expect(renderValue(forFloatArray([0.5]))).toBe('[0.5F]');
    expect(renderValue(forDoubleArray([1, 0.25]))).toBe('[1.0D, 0.25D]');
  });
});

describe('renderAnnotation', () => {
  it('should omit parentheses without values', () => {
    expect(renderAnnotation(createChildAnnotationElement(TAG, []))).toBe('@com.example.Tag');
  });

  it('should render nested annotations', () => {
    const inner = createChildAnnotationElement(TAG, [['name', forString('x')]]);
    const outer = createChildAnnotationElement(ReferenceType.of('com.example.Tags'), [
      ['value', forArray([{ kind: 'Annotation', value: inner }])],
    ]);

    expect(renderAnnotation(outer)).toBe('@com.example.Tags(value = [@com.example.Tag(name = "x")])');
  });
});

describe('value subsets', () => {
  it('should admit every non-array variant as an array element', () => {
    expect(isArrayElementValue(forString('a'))).toBe(true);
    expect(isArrayElementValue(forClass(ReferenceType.OBJECT))).toBe(true);
    expect(isArrayElementValue(forEnum(COLOR, 'RED'))).toBe(true);
    expect(isArrayElementValue(forInt(1))).toBe(true);
    expect(isArrayElementValue(forBoolean(true))).toBe(true);
    expect(isArrayElementValue(forLong(1n))).toBe(true);
    expect(isArrayElementValue(forDouble(0.5))).toBe(true);
  });

  it('should keep arrays out of arrays', () => {
    expect(isArrayElementValue(forIntArray([1]))).toBe(false);
    expect(isArrayElementValue(forStringArray(['a']))).toBe(false);
    expect(isArrayElementValue(forArray([]))).toBe(false);
  });

  it('should render heterogeneous arrays of scalars', () => {
    expect(renderValue(forArray([forInt(1), forLong(2n), forChar('c')]))).toBe("[1, 2L, 'c']");
  });

  it('should admit every variant as a default value', () => {
    expect(isDefaultValue(forIntArray([1]))).toBe(true);
    expect(isDefaultValue(forLong(1n))).toBe(true);
  });
});
