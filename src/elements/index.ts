/**
 * Element records.
 *
 * @packageDocumentation
 */

export { classAccessFlags, describeField, describeMethod } from './describe.js';
export { isLabelOnly, renderInstruction } from './instructions.js';
export type {
  Instruction,
  InstructionList,
  Label,
  LabelInstruction,
  OpInstruction,
  Operand,
} from './instructions.js';
export type {
  ClassElement,
  EnclosingMethodReference,
  FieldElement,
  FieldInitialValue,
  InnerClassElement,
  LocalVariableElement,
  MethodElement,
  ParameterElement,
  TryCatchBlockElement,
} from './types.js';
