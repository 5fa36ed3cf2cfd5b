import { describe, expect, it } from 'vitest';
import { PrimitiveType, ReferenceType } from '../descriptors/index.js';
import { EMPTY_ANNOTATIONS, EMPTY_TYPE_ANNOTATIONS } from '../annotations/index.js';
import { ElementError } from '../errors/index.js';
import { FINAL, flagsOf, PRIVATE, PUBLIC, STATIC } from '../flags/index.js';
import { forBoolean, forInt, forString } from '../values/index.js';
import {
  buildFieldElement,
  buildParameterElement,
  FieldElementBuilder,
  ParameterElementBuilder,
} from './index.js';

const POINT = ReferenceType.of('com.example.Point');
const NULLABLE = ReferenceType.of('com.example.Nullable');

describe('FieldElementBuilder', () => {
  it('should build a field without annotations', () => {
    const field = buildFieldElement(POINT, 'x', flagsOf(PRIVATE, FINAL), PrimitiveType.INT);

    expect(field).toEqual({
      owner: POINT,
      name: 'x',
      flags: flagsOf(PRIVATE, FINAL),
      type: PrimitiveType.INT,
      initialValue: undefined,
      signature: undefined,
      annotations: EMPTY_ANNOTATIONS,
      typeAnnotations: EMPTY_TYPE_ANNOTATIONS,
    });
    expect(field.annotations).toBe(EMPTY_ANNOTATIONS);
  });

  it('should take constant values from options or the builder', () => {
    const fromOptions = buildFieldElement(POINT, 'MAX', flagsOf(PUBLIC, STATIC, FINAL), PrimitiveType.INT, {
      initialValue: forInt(9),
    });
    const fromBuilder = buildFieldElement(
      POINT,
      'NAME',
      flagsOf(PUBLIC, STATIC, FINAL),
      ReferenceType.STRING,
      {},
      (field) => {
        field.initialValue(forString('origin'));
      }
    );

    expect(fromOptions.initialValue).toEqual(forInt(9));
    expect(fromBuilder.initialValue).toEqual(forString('origin'));
  });

  it('should clear a constant value', () => {
    const builder = new FieldElementBuilder(POINT, 'x', flagsOf(PRIVATE), PrimitiveType.INT, {
      initialValue: forInt(1),
    });

    expect(builder.initialValue(undefined).build().initialValue).toBeUndefined();
  });

  it('should reject constants of other variants', () => {
    const builder = new FieldElementBuilder(POINT, 'flag', flagsOf(PRIVATE), PrimitiveType.BOOLEAN);

    try {
      builder.initialValue(forBoolean(true));
      expect.unreachable('boolean constant should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ElementError);
      if (error instanceof ElementError) {
        expect(error.code).toBe('INVALID_VALUE');
        expect(error.subject).toBe('com.example.Point::flag: boolean');
        expect(error.message).toBe(
          'Initial value true of com.example.Point::flag: boolean must be an int, long, float, double or string'
        );
      }
    }
  });

  it('should collect annotations and freeze after build', () => {
    const builder = new FieldElementBuilder(POINT, 'x', flagsOf(PRIVATE), PrimitiveType.INT);
    builder.annotation(NULLABLE, { isVisibleAtRuntime: false });
    builder.typeAnnotation(0x13000000, undefined, NULLABLE);

    const field = builder.build();

    expect(field.annotations.invisible.map((a) => a.type)).toEqual([NULLABLE]);
    expect(field.typeAnnotations.visible.map((a) => a.typeRef)).toEqual([0x13000000]);
    expect(() => builder.build()).toThrow('Field com.example.Point::x: int has already been built');
  });
});

describe('ParameterElementBuilder', () => {
  it('should default to no flags', () => {
    const parameter = buildParameterElement(0, 'args');

    expect(parameter.index).toBe(0);
    expect(parameter.flags.isEmpty).toBe(true);
  });

  it('should freeze after build', () => {
    const builder = new ParameterElementBuilder(1, 'limit', flagsOf(FINAL));
    builder.build();

    try {
      builder.annotation(NULLABLE);
      expect.unreachable('parameter builder should be frozen');
    } catch (error) {
      expect(error).toBeInstanceOf(ElementError);
      if (error instanceof ElementError) {
        expect(error.code).toBe('BUILDER_FROZEN');
        expect(error.message).toBe("Parameter 'limit' (#1) has already been built");
      }
    }
  });
});
