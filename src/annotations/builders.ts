/**
 * Single-use builders for annotation elements.
 *
 * @packageDocumentation
 */

import { ReferenceType, type ReturnType } from '../descriptors/index.js';
import { ElementError } from '../errors/index.js';
import {
  forAnnotation,
  forBoolean,
  forAnnotationArray,
  forBooleanArray,
  forByte,
  forByteArray,
  forChar,
  forCharArray,
  forClass,
  forClassArray,
  forDouble,
  forDoubleArray,
  forEnum,
  forEnumArray,
  forFloat,
  forFloatArray,
  forInt,
  forIntArray,
  forLong,
  forLongArray,
  forShort,
  forShortArray,
  forString,
  forStringArray,
} from '../values/factories.js';
import { populate, type AnnotationSchema } from '../values/populate.js';
import type { AnnotationValue, EnumConstant } from '../values/types.js';
import {
  createChildAnnotationElement,
  type AnnotationElement,
  type ChildAnnotationElement,
  type TypeAnnotationElement,
} from './types.js';

/**
 * Options for root annotations.
 */
export interface RootAnnotationOptions {
  /** @defaultValue true */
  readonly isVisibleAtRuntime?: boolean | undefined;
  /** @defaultValue false */
  readonly allowRepeats?: boolean | undefined;
}

/**
 * Collects named values for one annotation element. A builder builds once;
 * any later call throws `BUILDER_FROZEN`.
 */
export abstract class AbstractAnnotationElementBuilder<E> {
  private readonly values = new Map<string, AnnotationValue>();
  private built = false;

  constructor(readonly type: ReferenceType) {}

  /**
   * Stores `value` under `name`, replacing an earlier value of that name.
   */
  value(name: string, value: AnnotationValue): this {
    this.ensureOpen();
    this.values.set(name, value);
    return this;
  }

  string(name: string, value: string): this {
    return this.value(name, forString(value));
  }

  boolean(name: string, value: boolean): this {
    return this.value(name, forBoolean(value));
  }

  char(name: string, value: string): this {
    return this.value(name, forChar(value));
  }

  byte(name: string, value: number): this {
    return this.value(name, forByte(value));
  }

  short(name: string, value: number): this {
    return this.value(name, forShort(value));
  }

  int(name: string, value: number): this {
    return this.value(name, forInt(value));
  }

  long(name: string, value: bigint | number): this {
    return this.value(name, forLong(value));
  }

  float(name: string, value: number): this {
    return this.value(name, forFloat(value));
  }

  double(name: string, value: number): this {
    return this.value(name, forDouble(value));
  }

  classRef(name: string, value: ReturnType): this {
    return this.value(name, forClass(value));
  }

  enumValue(name: string, type: ReferenceType, entryName: string): this {
    return this.value(name, forEnum(type, entryName));
  }

  strings(name: string, values: readonly string[]): this {
    return this.value(name, forStringArray(values));
  }

  classRefs(name: string, values: readonly ReturnType[]): this {
    return this.value(name, forClassArray(values));
  }

  booleans(name: string, values: readonly boolean[]): this {
    return this.value(name, forBooleanArray(values));
  }

  ints(name: string, values: readonly number[]): this {
    return this.value(name, forIntArray(values));
  }

  longs(name: string, values: readonly (bigint | number)[]): this {
    return this.value(name, forLongArray(values));
  }

  chars(name: string, values: readonly string[]): this {
    return this.value(name, forCharArray(values));
  }

  bytes(name: string, values: readonly number[]): this {
    return this.value(name, forByteArray(values));
  }

  shorts(name: string, values: readonly number[]): this {
    return this.value(name, forShortArray(values));
  }

  floats(name: string, values: readonly number[]): this {
    return this.value(name, forFloatArray(values));
  }

  doubles(name: string, values: readonly number[]): this {
    return this.value(name, forDoubleArray(values));
  }

  enums(name: string, values: readonly EnumConstant[]): this {
    return this.value(name, forEnumArray(values));
  }

  annotations(name: string, values: readonly ChildAnnotationElement[]): this {
    return this.value(name, forAnnotationArray(values));
  }

  /**
   * Stores a nested annotation: either a built element, or a new one of the
   * given type filled by `block`.
   */
  annotation(
    name: string,
    value: ChildAnnotationElement | ReferenceType,
    block?: (builder: ChildAnnotationElementBuilder) => void
  ): this {
    const element =
      value instanceof ReferenceType ? buildChildAnnotationElement(value, block) : value;
    return this.value(name, forAnnotation(element));
  }

  /**
   * Fills the builder from a host annotation instance.
   */
  populateFrom<T extends object>(instance: T, schema: AnnotationSchema<T>): this {
    this.ensureOpen();
    return populate(this, instance, schema);
  }

  /**
   * Produces the element and freezes the builder.
   */
  build(): E {
    this.ensureOpen();
    this.built = true;
    return this.create(new Map(this.values));
  }

  protected abstract create(values: ReadonlyMap<string, AnnotationValue>): E;

  private ensureOpen(): void {
    if (this.built) {
      throw new ElementError(
        `Annotation builder for '${this.type.asString()}' has already been built`,
        'BUILDER_FROZEN',
        this.type.asString()
      );
    }
  }
}

export class AnnotationElementBuilder extends AbstractAnnotationElementBuilder<AnnotationElement> {
  readonly isVisibleAtRuntime: boolean;
  readonly allowRepeats: boolean;

  constructor(type: ReferenceType, options: RootAnnotationOptions = {}) {
    super(type);
    this.isVisibleAtRuntime = options.isVisibleAtRuntime ?? true;
    this.allowRepeats = options.allowRepeats ?? false;
  }

  protected create(values: ReadonlyMap<string, AnnotationValue>): AnnotationElement {
    return Object.freeze({
      kind: 'Annotation',
      type: this.type,
      values,
      isVisibleAtRuntime: this.isVisibleAtRuntime,
      allowRepeats: this.allowRepeats,
    } satisfies AnnotationElement);
  }
}

export class TypeAnnotationElementBuilder extends AbstractAnnotationElementBuilder<TypeAnnotationElement> {
  readonly isVisibleAtRuntime: boolean;
  readonly allowRepeats: boolean;

  constructor(
    readonly typeRef: number,
    readonly typePath: string | undefined,
    type: ReferenceType,
    options: RootAnnotationOptions = {}
  ) {
    super(type);
    this.isVisibleAtRuntime = options.isVisibleAtRuntime ?? true;
    this.allowRepeats = options.allowRepeats ?? false;
  }

  protected create(values: ReadonlyMap<string, AnnotationValue>): TypeAnnotationElement {
    return Object.freeze({
      kind: 'TypeAnnotation',
      typeRef: this.typeRef,
      typePath: this.typePath,
      type: this.type,
      values,
      isVisibleAtRuntime: this.isVisibleAtRuntime,
      allowRepeats: this.allowRepeats,
    } satisfies TypeAnnotationElement);
  }
}

export class ChildAnnotationElementBuilder extends AbstractAnnotationElementBuilder<ChildAnnotationElement> {
  protected create(values: ReadonlyMap<string, AnnotationValue>): ChildAnnotationElement {
    return createChildAnnotationElement(this.type, values);
  }
}

/**
 * Builds a root annotation, running `block` exactly once.
 *
 * @example
 * ```typescript
 * const deprecated = buildAnnotationElement(ReferenceType.of('java.lang.Deprecated'), {}, (a) => {
 *   a.string('since', '9').boolean('forRemoval', true);
 * });
 * ```
 */
export function buildAnnotationElement(
  type: ReferenceType,
  options: RootAnnotationOptions = {},
  block?: (builder: AnnotationElementBuilder) => void
): AnnotationElement {
  const builder = new AnnotationElementBuilder(type, options);
  block?.(builder);
  return builder.build();
}

export function buildTypeAnnotationElement(
  typeRef: number,
  typePath: string | undefined,
  type: ReferenceType,
  options: RootAnnotationOptions = {},
  block?: (builder: TypeAnnotationElementBuilder) => void
): TypeAnnotationElement {
  const builder = new TypeAnnotationElementBuilder(typeRef, typePath, type, options);
  block?.(builder);
  return builder.build();
}

export function buildChildAnnotationElement(
  type: ReferenceType,
  block?: (builder: ChildAnnotationElementBuilder) => void
): ChildAnnotationElement {
  const builder = new ChildAnnotationElementBuilder(type);
  block?.(builder);
  return builder.build();
}

/**
 * Converts a host annotation instance into a root annotation of the schema's
 * type.
 */
export function annotationFrom<T extends object>(
  instance: T,
  schema: AnnotationSchema<T>,
  options: RootAnnotationOptions = {}
): AnnotationElement {
  return new AnnotationElementBuilder(schema.type, options).populateFrom(instance, schema).build();
}
