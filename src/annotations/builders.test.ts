import { describe, expect, it } from 'vitest';
import { PrimitiveType, ReferenceType } from '../descriptors/index.js';
import { ElementError } from '../errors/index.js';
import { defineSchema, forInt, forString, p, renderAnnotation } from '../values/index.js';
import {
  AnnotationElementBuilder,
  buildAnnotationElement,
  buildChildAnnotationElement,
  buildTypeAnnotationElement,
  ChildAnnotationElementBuilder,
  createChildAnnotationElement,
} from './index.js';

const DEPRECATED = ReferenceType.of('java.lang.Deprecated');
const TAG = ReferenceType.of('com.example.Tag');

describe('annotation element builders', () => {
  it('should default root annotations to visible and non-repeatable', () => {
    const element = buildAnnotationElement(DEPRECATED);

    expect(element.kind).toBe('Annotation');
    expect(element.isVisibleAtRuntime).toBe(true);
    expect(element.allowRepeats).toBe(false);
    expect(element.values.size).toBe(0);
    expect(Object.isFrozen(element)).toBe(true);
  });

  it('should collect values through the typed helpers in insertion order', () => {
    const element = buildChildAnnotationElement(TAG, (a) => {
      a.string('name', 'x')
        .boolean('flag', true)
        .char('letter', 'c')
        .byte('small', 1)
        .short('medium', 2)
        .int('size', 3)
        .long('big', 4n)
        .float('ratio', 0.5)
        .double('precise', 0.25)
        .classRef('type', PrimitiveType.LONG)
        .enumValue('mode', ReferenceType.of('com.example.Mode'), 'FAST')
        .strings('names', ['a'])
        .classRefs('types', [ReferenceType.STRING])
        .booleans('flags', [false])
        .ints('sizes', [1, 2])
        .longs('bigs', [5]);
    });

    expect(renderAnnotation(element)).toBe(
      '@com.example.Tag(name = "x", flag = true, letter = \'c\', small = 1B, medium = 2S, size = 3, ' +
        'big = 4L, ratio = 0.5F, precise = 0.25D, type = long, mode = com.example.Mode.FAST, ' +
        'names = ["a"], types = [java.lang.String], flags = [false], sizes = [1, 2], bigs = [5L])'
    );
  });

  it('should cover every array variant with a typed helper', () => {
    const mode = ReferenceType.of('com.example.Mode');
    const element = buildChildAnnotationElement(TAG, (a) => {
      a.chars('letters', ['a', 'b'])
        .bytes('smalls', [1])
        .shorts('mediums', [2])
        .floats('ratios', [1.5])
        .doubles('precise', [0.25])
        .enums('modes', [{ declaringType: mode, name: 'SLOW' }])
        .annotations('tags', [createChildAnnotationElement(DEPRECATED, [])]);
    });

    expect(renderAnnotation(element)).toBe(
      "@com.example.Tag(letters = ['a', 'b'], smalls = [1B], mediums = [2S], ratios = [1.5F], " +
        'precise = [0.25D], modes = [com.example.Mode.SLOW], tags = [@java.lang.Deprecated])'
    );
  });

  it('should replace a value stored under the same name', () => {
    const element = buildChildAnnotationElement(TAG, (a) => {
      a.int('size', 1).string('name', 'n').int('size', 2);
    });

    expect([...element.values.keys()]).toEqual(['size', 'name']);
    expect(element.values.get('size')).toEqual(forInt(2));
  });

  it('should nest annotations built in place or passed in', () => {
    const inner = createChildAnnotationElement(TAG, [['name', forString('in')]]);

    const element = buildChildAnnotationElement(ReferenceType.of('com.example.Outer'), (a) => {
      a.annotation('first', inner).annotation('second', TAG, (b) => {
        b.int('size', 1);
      });
    });

    expect(renderAnnotation(element)).toBe(
      '@com.example.Outer(first = @com.example.Tag(name = "in"), second = @com.example.Tag(size = 1))'
    );
  });

  it('should freeze after build', () => {
    const builder = new AnnotationElementBuilder(TAG);
    builder.build();

    try {
      builder.int('size', 1);
      expect.unreachable('builder should be frozen');
    } catch (error) {
      expect(error).toBeInstanceOf(ElementError);
      if (error instanceof ElementError) {
        expect(error.code).toBe('BUILDER_FROZEN');
        expect(error.message).toBe("Annotation builder for 'com.example.Tag' has already been built");
      }
    }
    expect(() => builder.build()).toThrow(ElementError);
  });

  it('should not let a later change reach a built element', () => {
    const builder = new ChildAnnotationElementBuilder(TAG);
    builder.int('size', 1);
    const element = builder.build();

    expect(element.values.size).toBe(1);
    expect(() => builder.int('other', 2)).toThrow(ElementError);
    expect(element.values.size).toBe(1);
  });

  it('should carry the type reference and path of type annotations', () => {
    const element = buildTypeAnnotationElement(0x13000000, '[0;', TAG, { allowRepeats: true }, (a) => {
      a.int('size', 1);
    });

    expect(element.kind).toBe('TypeAnnotation');
    expect(element.typeRef).toBe(0x13000000);
    expect(element.typePath).toBe('[0;');
    expect(element.allowRepeats).toBe(true);
  });

  it('should populate from host instances', () => {
    interface Tag {
      name: string;
    }
    const schema = defineSchema<Tag>(TAG, { name: p.string() });

    const element = new AnnotationElementBuilder(TAG).populateFrom({ name: 'host' }, schema).build();

    expect(element.values.get('name')).toEqual(forString('host'));
  });
});
