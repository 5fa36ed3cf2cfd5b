/**
 * Staged builders for classes, fields, methods and parameters.
 *
 * @packageDocumentation
 */

export { AnnotatableElementBuilder } from './annotatable.js';
export { buildClassElement, ClassElementBuilder } from './class-builder.js';
export type { ClassBuilderState, ClassElementOptions } from './class-builder.js';
export {
  buildFieldElement,
  buildParameterElement,
  FieldElementBuilder,
  ParameterElementBuilder,
} from './field-builder.js';
export type { FieldOptions } from './field-builder.js';
export { MethodBodyBuilder } from './method-body.js';
export type { CodeBuilder } from './method-body.js';
export { MethodElementBuilder } from './method-builder.js';
export type { MethodOptions, MethodOwner } from './method-builder.js';
