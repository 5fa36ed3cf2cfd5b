import { afterEach, describe, expect, it, vi } from 'vitest';
import { ReferenceType } from '../descriptors/index.js';
import { ElementError } from '../errors/index.js';
import { Logger } from '../utils/logger.js';
import {
  buildAnnotationElement,
  buildTypeAnnotationElement,
  ElementAnnotationsBuilder,
  ElementTypeAnnotationsBuilder,
  EMPTY_ANNOTATIONS,
  EMPTY_TYPE_ANNOTATIONS,
} from './index.js';

const NULLABLE = ReferenceType.of('com.example.Nullable');
const TAG = ReferenceType.of('com.example.Tag');

describe('ElementAnnotationsBuilder', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the shared empty instance without annotations', () => {
    expect(new ElementAnnotationsBuilder().build()).toBe(EMPTY_ANNOTATIONS);
    expect(new ElementTypeAnnotationsBuilder().build()).toBe(EMPTY_TYPE_ANNOTATIONS);
  });

  it('should split annotations by runtime visibility', () => {
    const builder = new ElementAnnotationsBuilder();
    const visible = buildAnnotationElement(NULLABLE);
    const invisible = buildAnnotationElement(TAG, { isVisibleAtRuntime: false });

    builder.add(visible);
    builder.add(invisible);
    const annotations = builder.build();

    expect(annotations.visible).toEqual([visible]);
    expect(annotations.invisible).toEqual([invisible]);
    expect(Object.isFrozen(annotations.visible)).toBe(true);
  });

  it('should reject a second annotation of the same type in one bucket', () => {
    const builder = new ElementAnnotationsBuilder();
    builder.add(buildAnnotationElement(NULLABLE));

    try {
      builder.add(buildAnnotationElement(NULLABLE));
      expect.unreachable('duplicate should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ElementError);
      if (error instanceof ElementError) {
        expect(error.code).toBe('DUPLICATE_ANNOTATION');
        expect(error.subject).toBe('com.example.Nullable');
        expect(error.message).toBe(
          "Element is already annotated with an annotation of type 'com.example.Nullable'"
        );
      }
    }
  });

  it('should check the buckets independently', () => {
    const builder = new ElementAnnotationsBuilder();
    builder.add(buildAnnotationElement(NULLABLE));
    builder.add(buildAnnotationElement(NULLABLE, { isVisibleAtRuntime: false }));

    const annotations = builder.build();

    expect(annotations.visible).toHaveLength(1);
    expect(annotations.invisible).toHaveLength(1);
  });

  it('should let an explicit visibility override the element', () => {
    const builder = new ElementAnnotationsBuilder();
    builder.add(buildAnnotationElement(NULLABLE), false);

    expect(builder.build().invisible).toHaveLength(1);
  });

  it('should accept repeats from annotations that allow them', () => {
    const builder = new ElementTypeAnnotationsBuilder();
    const repeated = buildTypeAnnotationElement(0, undefined, TAG, { allowRepeats: true });

    builder.add(repeated);
    builder.add(repeated);

    expect(builder.build().visible).toEqual([repeated, repeated]);
  });

  it('should log rejected annotations at debug level', () => {
    const lines: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      lines.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
    const builder = new ElementAnnotationsBuilder(new Logger({ component: 'test', debugMode: true }));
    builder.add(buildAnnotationElement(TAG));

    expect(() => builder.add(buildAnnotationElement(TAG))).toThrow(ElementError);

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'debug',
      component: 'test',
      event: 'annotation_rejected',
      data: { type: 'com.example.Tag', visible: true },
    });
  });
});
