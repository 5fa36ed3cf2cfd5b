/**
 * Annotation elements, their builders and per-element collections.
 *
 * @packageDocumentation
 */

export {
  AbstractAnnotationElementBuilder,
  AnnotationElementBuilder,
  annotationFrom,
  buildAnnotationElement,
  buildChildAnnotationElement,
  buildTypeAnnotationElement,
  ChildAnnotationElementBuilder,
  TypeAnnotationElementBuilder,
} from './builders.js';
export type { RootAnnotationOptions } from './builders.js';
export {
  ElementAnnotationsBuilder,
  ElementTypeAnnotationsBuilder,
  RootElementAnnotationsBuilder,
} from './element-annotations.js';
export {
  createChildAnnotationElement,
  EMPTY_ANNOTATIONS,
  EMPTY_TYPE_ANNOTATIONS,
  isChildAnnotationElement,
} from './types.js';
export type {
  AnnotationElement,
  ChildAnnotationElement,
  ElementAnnotations,
  ElementTypeAnnotations,
  RootAnnotationElement,
  RootElementAnnotations,
  TypeAnnotationElement,
} from './types.js';
