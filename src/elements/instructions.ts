/**
 * The abstract instruction sequence recorded for a method body.
 *
 * The element core never interprets instructions. It only needs to know
 * whether a body is empty and whether it holds anything besides labels; the
 * encoder resolves labels and emits bytes.
 *
 * @packageDocumentation
 */

import type { TypeDescriptor } from '../descriptors/index.js';

/**
 * A position marker in a method body. Labels compare by identity.
 */
export interface Label {
  readonly kind: 'Label';
  /** Sequence number, unique within one method body. */
  readonly id: number;
}

/**
 * Operand of an opaque instruction.
 */
export type Operand = string | number | bigint | boolean | TypeDescriptor | Label;

/**
 * A label placed in the sequence.
 */
export interface LabelInstruction {
  readonly kind: 'Label';
  readonly label: Label;
}

/**
 * An instruction the core does not interpret, e.g. `invokespecial`.
 */
export interface OpInstruction {
  readonly kind: 'Op';
  /** Lower-case mnemonic. */
  readonly opcode: string;
  readonly operands: readonly Operand[];
}

export type Instruction = LabelInstruction | OpInstruction;

export type InstructionList = readonly Instruction[];

/**
 * Whether every entry of a non-empty list is a label.
 */
export function isLabelOnly(instructions: InstructionList): boolean {
  return instructions.length > 0 && instructions.every((instruction) => instruction.kind === 'Label');
}

/**
 * Renders one instruction for diagnostics, e.g. `invokespecial java.lang.Object <init> () -> void`.
 */
export function renderInstruction(instruction: Instruction): string {
  if (instruction.kind === 'Label') {
    return `L${String(instruction.label.id)}:`;
  }
  const operands = instruction.operands.map((operand) => {
    if (typeof operand === 'object') {
      return 'kind' in operand ? `L${String(operand.id)}` : operand.asString();
    }
    return typeof operand === 'string' ? operand : String(operand);
  });
  return [instruction.opcode, ...operands].join(' ');
}
