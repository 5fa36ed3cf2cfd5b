/**
 * Shared base for builders of elements that carry annotations.
 *
 * @packageDocumentation
 */

import {
  annotationFrom,
  buildAnnotationElement,
  buildTypeAnnotationElement,
  type AnnotationElementBuilder,
  type RootAnnotationOptions,
  type TypeAnnotationElementBuilder,
} from '../annotations/builders.js';
import { ElementAnnotationsBuilder, ElementTypeAnnotationsBuilder } from '../annotations/element-annotations.js';
import type { AnnotationElement, TypeAnnotationElement } from '../annotations/types.js';
import type { ReferenceType } from '../descriptors/index.js';
import { ElementError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { AnnotationSchema } from '../values/populate.js';

/**
 * Holds the annotation buckets of one element and the frozen state of its
 * builder. Once {@link AnnotatableElementBuilder.freeze} has run, every
 * mutating call throws `BUILDER_FROZEN`.
 */
export abstract class AnnotatableElementBuilder {
  protected readonly annotations: ElementAnnotationsBuilder;
  protected readonly typeAnnotations: ElementTypeAnnotationsBuilder;
  private frozen = false;

  protected constructor(protected readonly logger: Logger | undefined) {
    this.annotations = new ElementAnnotationsBuilder(logger);
    this.typeAnnotations = new ElementTypeAnnotationsBuilder(logger);
  }

  /** Rendered name of the element, used in errors. */
  protected abstract describe(): string;

  /** Whether the element has been built. */
  get isBuilt(): boolean {
    return this.frozen;
  }

  /**
   * Builds an annotation of `type`, running `block` once, and attaches it.
   *
   * @throws ElementError with code `DUPLICATE_ANNOTATION` if the element
   * already carries a non-repeatable annotation of `type` in the same bucket.
   */
  annotation(
    type: ReferenceType,
    options: RootAnnotationOptions = {},
    block?: (builder: AnnotationElementBuilder) => void
  ): AnnotationElement {
    this.ensureOpen();
    const element = buildAnnotationElement(type, options, block);
    this.annotations.add(element);
    return element;
  }

  /**
   * Attaches a built annotation to the bucket chosen by `isVisible`.
   */
  addAnnotation(element: AnnotationElement, isVisible: boolean = element.isVisibleAtRuntime): this {
    this.ensureOpen();
    this.annotations.add(element, isVisible);
    return this;
  }

  /**
   * Attaches an annotation populated from a host annotation instance.
   */
  annotate<T extends object>(
    instance: T,
    schema: AnnotationSchema<T>,
    options: RootAnnotationOptions = {}
  ): AnnotationElement {
    this.ensureOpen();
    const element = annotationFrom(instance, schema, options);
    this.annotations.add(element);
    return element;
  }

  /**
   * Builds a type annotation, running `block` once, and attaches it.
   */
  typeAnnotation(
    typeRef: number,
    typePath: string | undefined,
    type: ReferenceType,
    options: RootAnnotationOptions = {},
    block?: (builder: TypeAnnotationElementBuilder) => void
  ): TypeAnnotationElement {
    this.ensureOpen();
    const element = buildTypeAnnotationElement(typeRef, typePath, type, options, block);
    this.typeAnnotations.add(element);
    return element;
  }

  protected ensureOpen(): void {
    if (this.frozen) {
      const subject = this.describe();
      throw new ElementError(`${subject} has already been built`, 'BUILDER_FROZEN', subject);
    }
  }

  protected freeze(): void {
    this.frozen = true;
  }
}
