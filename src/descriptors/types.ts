/**
 * Minimal type-descriptor layer.
 *
 * The element core treats types as opaque, comparable identities: it needs
 * equality and a readable rendering for diagnostics, nothing more. Descriptor
 * string formatting for the encoder lives here too so elements can hand
 * complete types across the encoder boundary.
 *
 * @packageDocumentation
 */

/**
 * An opaque type identity supplied to the element core.
 */
export interface TypeDescriptor {
  /** The class-file descriptor, e.g. `I` or `Ljava/lang/String;`. */
  readonly descriptor: string;
  /** Source-style rendering used in diagnostics, e.g. `java.lang.String`. */
  asString(): string;
  /** Structural equality by descriptor. */
  equals(other: TypeDescriptor): boolean;
}

/**
 * Names of the primitive value types.
 */
export type PrimitiveName =
  | 'boolean'
  | 'char'
  | 'byte'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double';

const PRIMITIVE_DESCRIPTORS: Readonly<Record<PrimitiveName, string>> = {
  boolean: 'Z',
  char: 'C',
  byte: 'B',
  short: 'S',
  int: 'I',
  long: 'J',
  float: 'F',
  double: 'D',
};

/**
 * A primitive value type.
 */
export class PrimitiveType implements TypeDescriptor {
  static readonly BOOLEAN = new PrimitiveType('boolean');
  static readonly CHAR = new PrimitiveType('char');
  static readonly BYTE = new PrimitiveType('byte');
  static readonly SHORT = new PrimitiveType('short');
  static readonly INT = new PrimitiveType('int');
  static readonly LONG = new PrimitiveType('long');
  static readonly FLOAT = new PrimitiveType('float');
  static readonly DOUBLE = new PrimitiveType('double');

  readonly descriptor: string;

  private constructor(readonly name: PrimitiveName) {
    this.descriptor = PRIMITIVE_DESCRIPTORS[name];
  }

  asString(): string {
    return this.name;
  }

  equals(other: TypeDescriptor): boolean {
    return other.descriptor === this.descriptor;
  }
}

/**
 * The `void` return type. Only valid as a method return type.
 */
export class VoidType implements TypeDescriptor {
  static readonly INSTANCE = new VoidType();

  readonly descriptor = 'V';

  private constructor() {}

  asString(): string {
    return 'void';
  }

  equals(other: TypeDescriptor): boolean {
    return other.descriptor === this.descriptor;
  }
}

/**
 * A class or interface type, identified by its internal name
 * (`java/lang/Object`).
 */
export class ReferenceType implements TypeDescriptor {
  static readonly OBJECT = ReferenceType.of('java.lang.Object');
  static readonly STRING = ReferenceType.of('java.lang.String');
  static readonly ENUM = ReferenceType.of('java.lang.Enum');
  static readonly RECORD = ReferenceType.of('java.lang.Record');
  static readonly THROWABLE = ReferenceType.of('java.lang.Throwable');

  readonly descriptor: string;

  private constructor(readonly internalName: string) {
    this.descriptor = `L${internalName};`;
  }

  /**
   * Creates a reference type from a binary (`java.lang.Object`) or internal
   * (`java/lang/Object`) class name.
   *
   * @throws Error if the name is empty or contains descriptor characters.
   */
  static of(className: string): ReferenceType {
    if (className.length === 0 || /[;[<>]/.test(className)) {
      throw new Error(`Invalid class name '${className}'`);
    }
    return new ReferenceType(className.replace(/\./g, '/'));
  }

  /** The simple name after the last package separator. */
  get simpleName(): string {
    const index = this.internalName.lastIndexOf('/');
    return index === -1 ? this.internalName : this.internalName.slice(index + 1);
  }

  asString(): string {
    return this.internalName.replace(/\//g, '.');
  }

  equals(other: TypeDescriptor): boolean {
    return other.descriptor === this.descriptor;
  }
}

/**
 * Any type that can be the type of a field, parameter or array component.
 */
export type FieldType = PrimitiveType | ReferenceType | ArrayType;

/**
 * Any type that can be returned from a method.
 */
export type ReturnType = FieldType | VoidType;

/**
 * An array type of one or more dimensions.
 */
export class ArrayType implements TypeDescriptor {
  readonly descriptor: string;

  constructor(
    readonly componentType: PrimitiveType | ReferenceType,
    readonly dimensions = 1
  ) {
    if (!Number.isInteger(dimensions) || dimensions < 1 || dimensions > 255) {
      throw new Error(`Array dimensions must be between 1 and 255, got ${String(dimensions)}`);
    }
    this.descriptor = '['.repeat(dimensions) + componentType.descriptor;
  }

  asString(): string {
    return this.componentType.asString() + '[]'.repeat(this.dimensions);
  }

  equals(other: TypeDescriptor): boolean {
    return other.descriptor === this.descriptor;
  }
}

/**
 * A method type: argument types and a return type.
 */
export class MethodType implements TypeDescriptor {
  readonly descriptor: string;
  readonly argumentTypes: readonly FieldType[];

  constructor(
    readonly returnType: ReturnType,
    ...argumentTypes: FieldType[]
  ) {
    this.argumentTypes = argumentTypes;
    this.descriptor = `(${argumentTypes.map((type) => type.descriptor).join('')})${returnType.descriptor}`;
  }

  asString(): string {
    return `(${this.argumentTypes.map((type) => type.asString()).join(', ')}) -> ${this.returnType.asString()}`;
  }

  equals(other: TypeDescriptor): boolean {
    return other.descriptor === this.descriptor;
  }
}

/**
 * Checks whether a value is one of the descriptor classes above.
 */
export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  return (
    value instanceof PrimitiveType ||
    value instanceof ReferenceType ||
    value instanceof ArrayType ||
    value instanceof MethodType ||
    value instanceof VoidType
  );
}
