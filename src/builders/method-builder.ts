/**
 * Method builders.
 *
 * @packageDocumentation
 */

import type { FieldType, MethodType, ReferenceType } from '../descriptors/index.js';
import { describeMethod } from '../elements/describe.js';
import type { Label } from '../elements/instructions.js';
import type {
  LocalVariableElement,
  MethodElement,
  ParameterElement,
  TryCatchBlockElement,
} from '../elements/types.js';
import { ElementError } from '../errors/index.js';
import { FlagSet } from '../flags/index.js';
import type { ClassKind } from '../rules/class-kind.js';
import type { Logger } from '../utils/logger.js';
import type { DefaultValue } from '../values/types.js';
import { AnnotatableElementBuilder } from './annotatable.js';
import { buildParameterElement, type ParameterElementBuilder } from './field-builder.js';
import { MethodBodyBuilder, type CodeBuilder } from './method-body.js';

/**
 * What a method builder needs to know about its class.
 */
export interface MethodOwner {
  readonly type: ReferenceType;
  readonly kind: ClassKind;
}

export interface MethodOptions {
  readonly signature?: string | undefined;
  readonly exceptions?: readonly ReferenceType[] | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Accumulates one method: flags, parameters, try/catch regions, local
 * variables, an annotation default, annotations and the body.
 *
 * @example
 * ```typescript
 * const method = new MethodElementBuilder(owner, 'answer', flagsOf(PUBLIC), new MethodType(PrimitiveType.INT));
 * method.withBody((body) => body.emit('bipush', 42).returnValue());
 * const element = method.build();
 * ```
 */
export class MethodElementBuilder extends AnnotatableElementBuilder {
  readonly signature: string | undefined;
  readonly exceptions: readonly ReferenceType[];
  private readonly body: MethodBodyBuilder;
  private readonly parameters = new Map<number, ParameterElement>();
  private readonly parameterFlags = new Map<string, FlagSet<'parameter'>>();
  private readonly tryCatchBlocks: TryCatchBlockElement[] = [];
  private readonly localVariables: LocalVariableElement[] = [];
  private annotationDefault: DefaultValue | undefined;

  constructor(
    readonly owner: MethodOwner,
    readonly name: string,
    readonly flags: FlagSet<'method'>,
    readonly type: MethodType,
    options: MethodOptions = {}
  ) {
    super(options.logger);
    this.signature = options.signature;
    this.exceptions = [...(options.exceptions ?? [])];
    this.body = new MethodBodyBuilder(type.returnType, () => this.ensureOpen());
  }

  protected describe(): string {
    return `Method ${describeMethod(this.snapshotHeader())}`;
  }

  /** The default value of this annotation property, if set. */
  get defaultValue(): DefaultValue | undefined {
    return this.annotationDefault;
  }

  /**
   * Sets or clears the annotation-property default.
   *
   * @throws ElementError with code `DEFAULT_VALUE_ON_NON_ANNOTATION` when a
   * value is set and the owning class is not an annotation type.
   */
  setDefaultValue(value: DefaultValue | undefined): this {
    this.ensureOpen();
    if (value !== undefined && this.owner.kind !== 'annotation') {
      const subject = describeMethod(this.snapshotHeader());
      throw new ElementError(
        `Owner ${this.owner.type.asString()} of method ${subject} is not an annotation, but is of kind ${this.owner.kind}`,
        'DEFAULT_VALUE_ON_NON_ANNOTATION',
        subject
      );
    }
    this.annotationDefault = value;
    return this;
  }

  /**
   * Declares the parameter at `index`, running `block` once. A later
   * declaration of the same index replaces the earlier one.
   */
  parameter(
    index: number,
    name: string,
    flags: FlagSet<'parameter'> = FlagSet.none(),
    block?: (builder: ParameterElementBuilder) => void
  ): ParameterElement {
    this.ensureOpen();
    const parameter = buildParameterElement(index, name, flags, block, this.logger);
    this.parameters.set(index, parameter);
    return parameter;
  }

  /**
   * Overrides the flags of the parameter called `name`. When no parameter of
   * that name is declared at build time, one is added at the lowest free
   * index.
   */
  parameterFlag(name: string, flags: FlagSet<'parameter'>): this {
    this.ensureOpen();
    this.parameterFlags.set(name, flags);
    return this;
  }

  /**
   * Adds a protected region. Without `exceptionType` the handler catches
   * everything.
   */
  tryCatch(start: Label, end: Label, handler: Label, exceptionType?: ReferenceType): this {
    this.ensureOpen();
    this.tryCatchBlocks.push(Object.freeze({ start, end, handler, exceptionType }));
    return this;
  }

  localVariable(
    name: string,
    type: FieldType,
    start: Label,
    end: Label,
    index: number,
    signature?: string
  ): this {
    this.ensureOpen();
    this.localVariables.push(Object.freeze({ name, type, signature, start, end, index }));
    return this;
  }

  /**
   * Runs `block` exactly once with the body builder and returns its result.
   */
  withBody<R>(block: (body: MethodBodyBuilder) => R): R {
    this.ensureOpen();
    return block(this.body);
  }

  /**
   * Runs `block` exactly once with the raw emission view and returns its
   * result.
   */
  withCode<R>(block: (code: CodeBuilder) => R): R {
    this.ensureOpen();
    return block(this.body.code);
  }

  build(): MethodElement {
    this.ensureOpen();
    const element: MethodElement = {
      owner: this.owner.type,
      name: this.name,
      flags: this.flags,
      type: this.type,
      signature: this.signature,
      exceptions: Object.freeze([...this.exceptions]),
      parameters: Object.freeze(this.resolveParameters()),
      localVariables: Object.freeze([...this.localVariables]),
      tryCatchBlocks: Object.freeze([...this.tryCatchBlocks]),
      defaultValue: this.annotationDefault,
      annotations: this.annotations.build(),
      typeAnnotations: this.typeAnnotations.build(),
      body: this.body.build(),
    };
    this.freeze();
    return Object.freeze(element);
  }

  private resolveParameters(): ParameterElement[] {
    const byIndex = new Map(this.parameters);
    for (const [name, flags] of this.parameterFlags) {
      const existing = [...byIndex.values()].find((parameter) => parameter.name === name);
      if (existing !== undefined) {
        byIndex.set(existing.index, Object.freeze({ ...existing, flags }));
        continue;
      }
      let index = 0;
      while (byIndex.has(index)) {
        index += 1;
      }
      byIndex.set(index, buildParameterElement(index, name, flags));
    }
    return [...byIndex.values()].sort((a, b) => a.index - b.index);
  }

  private snapshotHeader(): Pick<MethodElement, 'owner' | 'name' | 'type' | 'parameters'> {
    return {
      owner: this.owner.type,
      name: this.name,
      type: this.type,
      parameters: [...this.parameters.values()],
    };
  }
}
