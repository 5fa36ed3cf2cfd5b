/**
 * Recording of abstract method bodies.
 *
 * @packageDocumentation
 */

import {
  PrimitiveType,
  VoidType,
  type MethodType,
  type ReferenceType,
  type ReturnType,
} from '../descriptors/index.js';
import type { Instruction, InstructionList, Label, Operand } from '../elements/instructions.js';

/**
 * The raw emission view of a body, as handed to `withCode` blocks.
 */
export interface CodeBuilder {
  /** Instructions recorded so far. */
  readonly instructions: InstructionList;
  newLabel(): Label;
  mark(label: Label): this;
  emit(opcode: string, ...operands: Operand[]): this;
}

function returnOpcode(type: ReturnType): string {
  if (type instanceof VoidType) {
    return 'return';
  }
  if (!(type instanceof PrimitiveType)) {
    return 'areturn';
  }
  switch (type.name) {
    case 'long':
      return 'lreturn';
    case 'float':
      return 'freturn';
    case 'double':
      return 'dreturn';
    default:
      return 'ireturn';
  }
}

/**
 * Records the instruction sequence of one method: labels, opaque opcodes and
 * a few named helpers.
 */
export class MethodBodyBuilder implements CodeBuilder {
  private readonly recorded: Instruction[] = [];
  private labelCount = 0;

  /**
   * @param returnType - Return type of the method, used by {@link returnValue}.
   * @param ensureOpen - Called before every mutation; throws once the owning
   * method has been built.
   */
  constructor(
    private readonly returnType: ReturnType,
    private readonly ensureOpen: () => void = () => undefined
  ) {}

  get instructions(): InstructionList {
    return this.recorded;
  }

  get isEmpty(): boolean {
    return this.recorded.length === 0;
  }

  /** The raw emission view. */
  get code(): CodeBuilder {
    return this;
  }

  /**
   * Creates a label. It is not part of the body until {@link mark}ed.
   */
  newLabel(): Label {
    this.labelCount += 1;
    const label: Label = { kind: 'Label', id: this.labelCount };
    return Object.freeze(label);
  }

  /**
   * Places `label` at the current position.
   */
  mark(label: Label): this {
    this.ensureOpen();
    this.recorded.push({ kind: 'Label', label });
    return this;
  }

  /**
   * Creates a label and places it at the current position.
   */
  newBoundLabel(): Label {
    const label = this.newLabel();
    this.mark(label);
    return label;
  }

  emit(opcode: string, ...operands: Operand[]): this {
    this.ensureOpen();
    this.recorded.push({ kind: 'Op', opcode, operands });
    return this;
  }

  /** Pushes the receiver. */
  loadThis(): this {
    return this.emit('aload', 0);
  }

  /** Calls the constructor `type` of `owner` on the value on the stack. */
  invokeConstructor(owner: ReferenceType, type: MethodType): this {
    return this.emit('invokespecial', owner, '<init>', type);
  }

  /** Returns from the method with the instruction for its return type. */
  returnValue(): this {
    return this.emit(returnOpcode(this.returnType));
  }

  /** A frozen copy of the recorded sequence. */
  build(): InstructionList {
    return Object.freeze([...this.recorded]);
  }
}
