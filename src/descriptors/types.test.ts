import { describe, expect, it } from 'vitest';
import {
  ArrayType,
  isTypeDescriptor,
  MethodType,
  PrimitiveType,
  ReferenceType,
  VoidType,
} from './index.js';

describe('type descriptors', () => {
  it('should accept binary and internal class names', () => {
    const binary = ReferenceType.of('java.util.List');
    const internal = ReferenceType.of('java/util/List');

    expect(binary.descriptor).toBe('Ljava/util/List;');
    expect(binary.equals(internal)).toBe(true);
    expect(binary.asString()).toBe('java.util.List');
    expect(binary.simpleName).toBe('List');
  });

  it('should reject invalid class names', () => {
    expect(() => ReferenceType.of('')).toThrow("Invalid class name ''");
    expect(() => ReferenceType.of('Ljava/lang/String;')).toThrow(Error);
  });

  it('should render arrays', () => {
    const matrix = new ArrayType(PrimitiveType.DOUBLE, 2);

    expect(matrix.descriptor).toBe('[[D');
    expect(matrix.asString()).toBe('double[][]');
    expect(() => new ArrayType(PrimitiveType.INT, 0)).toThrow(
      'Array dimensions must be between 1 and 255, got 0'
    );
  });

  it('should build method descriptors', () => {
    const type = new MethodType(
      VoidType.INSTANCE,
      PrimitiveType.INT,
      new ArrayType(ReferenceType.STRING)
    );

    expect(type.descriptor).toBe('(I[Ljava/lang/String;)V');
    expect(type.asString()).toBe('(int, java.lang.String[]) -> void');
    expect(type.equals(new MethodType(VoidType.INSTANCE, PrimitiveType.INT))).toBe(false);
  });

  it('should compare across descriptor classes by descriptor', () => {
    expect(PrimitiveType.INT.equals(PrimitiveType.INT)).toBe(true);
    expect(PrimitiveType.INT.equals(PrimitiveType.LONG)).toBe(false);
    expect(VoidType.INSTANCE.equals(PrimitiveType.INT)).toBe(false);
  });

  it('should recognise descriptor instances', () => {
    expect(isTypeDescriptor(ReferenceType.OBJECT)).toBe(true);
    expect(isTypeDescriptor({ descriptor: 'I' })).toBe(false);
  });
});
