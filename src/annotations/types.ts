/**
 * Annotation element records and per-element annotation collections.
 *
 * @packageDocumentation
 */

import type { ReferenceType } from '../descriptors/index.js';
import type { AnnotationValue } from '../values/types.js';

/**
 * Properties shared by every annotation element.
 */
interface AnnotationElementBase {
  /** The annotation type. */
  readonly type: ReferenceType;
  /** Property values in insertion order. */
  readonly values: ReadonlyMap<string, AnnotationValue>;
}

/**
 * An annotation nested as the value of another annotation's property.
 */
export interface ChildAnnotationElement extends AnnotationElementBase {
  readonly kind: 'Child';
}

/**
 * Properties of annotations attached directly to an element.
 */
interface RootAnnotationElementBase extends AnnotationElementBase {
  /** Whether the annotation is retained for runtime reflection. */
  readonly isVisibleAtRuntime: boolean;
  /** Whether the element may carry several annotations of this type. */
  readonly allowRepeats: boolean;
}

/**
 * A root annotation on a class, field, method or parameter.
 */
export interface AnnotationElement extends RootAnnotationElementBase {
  readonly kind: 'Annotation';
}

/**
 * A root annotation on a type use, such as a field type or a thrown exception.
 */
export interface TypeAnnotationElement extends RootAnnotationElementBase {
  readonly kind: 'TypeAnnotation';
  /** Encoded target of the type use (sort and index). */
  readonly typeRef: number;
  /** Path into the annotated type, e.g. `[0;`, or `undefined` for the type itself. */
  readonly typePath: string | undefined;
}

/**
 * Either kind of root annotation.
 */
export type RootAnnotationElement = AnnotationElement | TypeAnnotationElement;

/**
 * The annotations of one element, split by runtime visibility.
 */
export interface RootElementAnnotations<A extends RootAnnotationElement> {
  readonly visible: readonly A[];
  readonly invisible: readonly A[];
}

export type ElementAnnotations = RootElementAnnotations<AnnotationElement>;
export type ElementTypeAnnotations = RootElementAnnotations<TypeAnnotationElement>;

/**
 * Shared instance for elements without annotations.
 */
export const EMPTY_ANNOTATIONS: ElementAnnotations = Object.freeze({
  visible: Object.freeze([]),
  invisible: Object.freeze([]),
});

/**
 * Shared instance for elements without type annotations.
 */
export const EMPTY_TYPE_ANNOTATIONS: ElementTypeAnnotations = Object.freeze({
  visible: Object.freeze([]),
  invisible: Object.freeze([]),
});

/**
 * Creates a frozen nested annotation from its type and values.
 */
export function createChildAnnotationElement(
  type: ReferenceType,
  values: Iterable<readonly [string, AnnotationValue]>
): ChildAnnotationElement {
  const element: ChildAnnotationElement = { kind: 'Child', type, values: new Map(values) };
  return Object.freeze(element);
}

/**
 * Checks whether a host value is a nested annotation element.
 */
export function isChildAnnotationElement(value: unknown): value is ChildAnnotationElement {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'Child' &&
    'values' in value &&
    value.values instanceof Map
  );
}
