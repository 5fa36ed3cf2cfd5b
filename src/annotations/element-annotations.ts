/**
 * Accumulates the root annotations of one element.
 *
 * @packageDocumentation
 */

import { ElementError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import {
  EMPTY_ANNOTATIONS,
  EMPTY_TYPE_ANNOTATIONS,
  type AnnotationElement,
  type RootAnnotationElement,
  type RootElementAnnotations,
  type TypeAnnotationElement,
} from './types.js';

/**
 * Two insertion-ordered buckets, visible and invisible at runtime.
 *
 * Within a bucket an annotation type may occur once, unless the annotation
 * being inserted allows repeats. The buckets are checked independently.
 */
export class RootElementAnnotationsBuilder<A extends RootAnnotationElement> {
  private readonly visible: A[] = [];
  private readonly invisible: A[] = [];

  constructor(
    private readonly empty: RootElementAnnotations<A>,
    private readonly logger?: Logger | undefined
  ) {}

  /**
   * Adds `element` to the bucket chosen by `isVisible`.
   *
   * @throws ElementError with code `DUPLICATE_ANNOTATION` if the bucket
   * already holds an annotation of the same type and `element` does not allow
   * repeats.
   */
  add(element: A, isVisible: boolean = element.isVisibleAtRuntime): void {
    const bucket = isVisible ? this.visible : this.invisible;
    if (!element.allowRepeats && bucket.some((existing) => existing.type.equals(element.type))) {
      const type = element.type.asString();
      this.logger?.debug('annotation_rejected', { type, visible: isVisible });
      throw new ElementError(
        `Element is already annotated with an annotation of type '${type}'`,
        'DUPLICATE_ANNOTATION',
        type
      );
    }
    bucket.push(element);
  }

  /** Whether neither bucket holds anything. */
  get isEmpty(): boolean {
    return this.visible.length === 0 && this.invisible.length === 0;
  }

  /**
   * Snapshots both buckets. Returns the shared empty instance when both are
   * empty.
   */
  build(): RootElementAnnotations<A> {
    if (this.isEmpty) {
      return this.empty;
    }
    return Object.freeze({
      visible: Object.freeze([...this.visible]),
      invisible: Object.freeze([...this.invisible]),
    });
  }
}

export class ElementAnnotationsBuilder extends RootElementAnnotationsBuilder<AnnotationElement> {
  constructor(logger?: Logger | undefined) {
    super(EMPTY_ANNOTATIONS, logger);
  }
}

export class ElementTypeAnnotationsBuilder extends RootElementAnnotationsBuilder<TypeAnnotationElement> {
  constructor(logger?: Logger | undefined) {
    super(EMPTY_TYPE_ANNOTATIONS, logger);
  }
}
