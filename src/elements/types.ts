/**
 * Immutable element records produced by the builders and handed to the
 * encoder.
 *
 * @packageDocumentation
 */

import type { ElementAnnotations, ElementTypeAnnotations } from '../annotations/types.js';
import type { FieldType, MethodType, ReferenceType } from '../descriptors/index.js';
import type { FlagSet } from '../flags/index.js';
import type { ClassKind } from '../rules/class-kind.js';
import type { DefaultValue, ForDouble, ForFloat, ForInt, ForLong, ForString } from '../values/types.js';
import type { ClassFileVersion } from '../version/index.js';
import type { InstructionList, Label } from './instructions.js';

/**
 * Constant initial value of a field.
 */
export type FieldInitialValue = ForInt | ForLong | ForFloat | ForDouble | ForString;

export interface FieldElement {
  readonly owner: ReferenceType;
  readonly name: string;
  readonly flags: FlagSet<'field'>;
  readonly type: FieldType;
  readonly initialValue: FieldInitialValue | undefined;
  readonly signature: string | undefined;
  readonly annotations: ElementAnnotations;
  readonly typeAnnotations: ElementTypeAnnotations;
}

export interface ParameterElement {
  /** Zero-based index into the method's argument types. */
  readonly index: number;
  readonly name: string;
  readonly flags: FlagSet<'parameter'>;
  readonly annotations: ElementAnnotations;
  readonly typeAnnotations: ElementTypeAnnotations;
}

/**
 * A local-variable descriptor live between two labels.
 */
export interface LocalVariableElement {
  readonly name: string;
  readonly type: FieldType;
  readonly signature: string | undefined;
  readonly start: Label;
  readonly end: Label;
  /** Slot index in the local-variable table. */
  readonly index: number;
}

/**
 * A protected region. An `undefined` exception type catches everything.
 */
export interface TryCatchBlockElement {
  readonly start: Label;
  readonly end: Label;
  readonly handler: Label;
  readonly exceptionType: ReferenceType | undefined;
}

export interface MethodElement {
  readonly owner: ReferenceType;
  readonly name: string;
  readonly flags: FlagSet<'method'>;
  readonly type: MethodType;
  readonly signature: string | undefined;
  readonly exceptions: readonly ReferenceType[];
  /** Ordered by index. */
  readonly parameters: readonly ParameterElement[];
  readonly localVariables: readonly LocalVariableElement[];
  readonly tryCatchBlocks: readonly TryCatchBlockElement[];
  /** Default of an annotation property, only on annotation types. */
  readonly defaultValue: DefaultValue | undefined;
  readonly annotations: ElementAnnotations;
  readonly typeAnnotations: ElementTypeAnnotations;
  readonly body: InstructionList;
}

/**
 * Reference to the method a local or anonymous class is declared in.
 */
export interface EnclosingMethodReference {
  readonly owner: ReferenceType;
  readonly name: string;
  readonly type: MethodType;
}

/**
 * An entry of the inner-classes table.
 */
export interface InnerClassElement {
  readonly type: ReferenceType;
  /** `undefined` for local and anonymous classes. */
  readonly outerType: ReferenceType | undefined;
  /** `undefined` for anonymous classes. */
  readonly innerName: string | undefined;
  readonly flags: FlagSet<'class'>;
}

export interface ClassElement {
  readonly version: ClassFileVersion;
  readonly kind: ClassKind;
  readonly type: ReferenceType;
  /** Flags without the kind bit; see `classAccessFlags` for the encoded set. */
  readonly flags: FlagSet<'class'>;
  readonly signature: string | undefined;
  readonly supertype: ReferenceType;
  readonly interfaces: readonly ReferenceType[];
  readonly sourceFile: string | undefined;
  readonly sourceDebug: string | undefined;
  readonly permittedSubtypes: readonly ReferenceType[];
  readonly enclosingMethod: EnclosingMethodReference | undefined;
  readonly enclosingClass: ReferenceType | undefined;
  readonly innerClasses: readonly InnerClassElement[];
  readonly nestHost: ReferenceType | undefined;
  readonly nestMates: readonly ReferenceType[];
  /** Keyed by field name, in declaration order. */
  readonly fields: ReadonlyMap<string, FieldElement>;
  readonly methods: readonly MethodElement[];
  /** Whether the encoder sets the `SUPER` bit. */
  readonly treatSuperSpecially: boolean;
  readonly annotations: ElementAnnotations;
  readonly typeAnnotations: ElementTypeAnnotations;
}
