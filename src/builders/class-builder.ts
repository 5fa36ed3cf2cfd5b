/**
 * The class builder and its state machine.
 *
 * A builder starts `open`, becomes `verified` once the state rules pass and
 * `built` once an element has been produced. The state rules run on
 * construction and again whenever kind, version, flags or supertype change;
 * a change that breaks them is rolled back before the error propagates.
 *
 * @packageDocumentation
 */

import {
  MethodType,
  ReferenceType,
  VoidType,
  type FieldType,
} from '../descriptors/index.js';
import { describeMethod } from '../elements/describe.js';
import type {
  ClassElement,
  EnclosingMethodReference,
  FieldElement,
  InnerClassElement,
  MethodElement,
} from '../elements/types.js';
import { ClassValidationError, ElementError, type ValidationPhase } from '../errors/index.js';
import { FlagSet, PUBLIC, STATIC } from '../flags/index.js';
import type { ClassKind } from '../rules/class-kind.js';
import {
  checkBeforeBuild,
  checkState,
  validateClassShape,
  type ClassShape,
  type ClassValidationResult,
} from '../rules/rule-engine.js';
import type { Logger } from '../utils/logger.js';
import type { ClassFileVersion } from '../version/index.js';
import { AnnotatableElementBuilder } from './annotatable.js';
import { FieldElementBuilder, type FieldOptions } from './field-builder.js';
import { MethodElementBuilder, type MethodOptions } from './method-builder.js';

/**
 * Lifecycle state of a {@link ClassElementBuilder}.
 */
export type ClassBuilderState = 'open' | 'verified' | 'built';

export interface ClassElementOptions {
  readonly version: ClassFileVersion;
  readonly kind: ClassKind;
  readonly type: ReferenceType;
  /** Flags without the kind bit. @defaultValue `PUBLIC` */
  readonly flags?: FlagSet<'class'> | undefined;
  readonly signature?: string | undefined;
  /** @defaultValue `java.lang.Object` */
  readonly supertype?: ReferenceType | undefined;
  readonly interfaces?: readonly ReferenceType[] | undefined;
  readonly permittedSubtypes?: readonly ReferenceType[] | undefined;
  readonly sourceFile?: string | undefined;
  readonly sourceDebug?: string | undefined;
  /** @defaultValue true */
  readonly treatSuperSpecially?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

const CONSTRUCTOR_NAME = '<init>';
const STATIC_INIT_NAME = '<clinit>';

/**
 * Accumulates one class and validates it against the structural rules.
 *
 * @example
 * ```typescript
 * const builder = new ClassElementBuilder({
 *   version: 'RELEASE_17',
 *   kind: 'class',
 *   type: ReferenceType.of('com.example.Point'),
 * });
 * builder.field('ORIGIN', flagsOf(PUBLIC, STATIC, FINAL), ReferenceType.of('com.example.Point'));
 * builder.defaultConstructor();
 * const element = builder.build();
 * ```
 */
export class ClassElementBuilder extends AnnotatableElementBuilder {
  readonly type: ReferenceType;
  readonly signature: string | undefined;
  readonly interfaces: readonly ReferenceType[];
  readonly permittedSubtypes: readonly ReferenceType[];
  readonly sourceFile: string | undefined;
  readonly sourceDebug: string | undefined;

  private currentVersion: ClassFileVersion;
  private currentKind: ClassKind;
  private currentFlags: FlagSet<'class'>;
  private currentSupertype: ReferenceType;
  private superSpecial: boolean;
  private lifecycle: ClassBuilderState = 'open';

  private readonly fields = new Map<string, FieldElement>();
  private readonly methods: MethodElement[] = [];
  private readonly innerClasses: InnerClassElement[] = [];
  private readonly nestMates: ReferenceType[] = [];
  private host: ReferenceType | undefined;
  private outerClass: ReferenceType | undefined;
  private outerMethod: EnclosingMethodReference | undefined;

  /**
   * @throws ClassValidationError with phase `state` if the initial kind,
   * version, flags and supertype break the state rules.
   */
  constructor(options: ClassElementOptions) {
    super(options.logger);
    this.type = options.type;
    this.currentVersion = options.version;
    this.currentKind = options.kind;
    this.currentFlags = options.flags ?? FlagSet.none<'class'>().plus(PUBLIC);
    this.currentSupertype = options.supertype ?? ReferenceType.OBJECT;
    this.signature = options.signature;
    this.interfaces = [...(options.interfaces ?? [])];
    this.permittedSubtypes = [...(options.permittedSubtypes ?? [])];
    this.sourceFile = options.sourceFile;
    this.sourceDebug = options.sourceDebug;
    this.superSpecial = options.treatSuperSpecially ?? true;
    this.verifyState();
  }

  protected describe(): string {
    return `Class ${this.type.asString()}`;
  }

  get state(): ClassBuilderState {
    return this.lifecycle;
  }

  get version(): ClassFileVersion {
    return this.currentVersion;
  }

  set version(version: ClassFileVersion) {
    const previous = this.currentVersion;
    this.change(
      () => (this.currentVersion = version),
      () => (this.currentVersion = previous)
    );
  }

  get kind(): ClassKind {
    return this.currentKind;
  }

  set kind(kind: ClassKind) {
    const previous = this.currentKind;
    this.change(
      () => (this.currentKind = kind),
      () => (this.currentKind = previous)
    );
  }

  get flags(): FlagSet<'class'> {
    return this.currentFlags;
  }

  set flags(flags: FlagSet<'class'>) {
    const previous = this.currentFlags;
    this.change(
      () => (this.currentFlags = flags),
      () => (this.currentFlags = previous)
    );
  }

  get supertype(): ReferenceType {
    return this.currentSupertype;
  }

  set supertype(supertype: ReferenceType) {
    const previous = this.currentSupertype;
    this.change(
      () => (this.currentSupertype = supertype),
      () => (this.currentSupertype = previous)
    );
  }

  /** Whether the encoder sets the `SUPER` bit. */
  get treatSuperSpecially(): boolean {
    return this.superSpecial;
  }

  set treatSuperSpecially(value: boolean) {
    this.ensureOpen();
    this.superSpecial = value;
  }

  /** Whether the supertype is `java.lang.Object`. */
  get hasDefaultSupertype(): boolean {
    return this.currentSupertype.equals(ReferenceType.OBJECT);
  }

  // -- Members --

  /**
   * Declares a field, running `block` once with its builder.
   *
   * @throws ElementError with code `DUPLICATE_FIELD` if the name is taken.
   */
  field(
    name: string,
    flags: FlagSet<'field'>,
    type: FieldType,
    options: Omit<FieldOptions, 'logger'> = {},
    block?: (builder: FieldElementBuilder) => void
  ): FieldElement {
    this.ensureOpen();
    if (this.fields.has(name)) {
      const subject = `${this.type.asString()}::${name}`;
      throw new ElementError(
        `Field '${name}' is already declared in ${this.type.asString()}`,
        'DUPLICATE_FIELD',
        subject
      );
    }
    const builder = new FieldElementBuilder(this.type, name, flags, type, {
      ...options,
      logger: this.logger,
    });
    block?.(builder);
    const element = builder.build();
    this.fields.set(name, element);
    return element;
  }

  /**
   * Declares a method, running `block` once with its builder.
   *
   * @throws ElementError with code `DUPLICATE_METHOD` if a method of the same
   * name and descriptor exists.
   */
  method(
    name: string,
    flags: FlagSet<'method'>,
    type: MethodType,
    options: Omit<MethodOptions, 'logger'> = {},
    block?: (builder: MethodElementBuilder) => void
  ): MethodElement {
    this.ensureOpen();
    const duplicate = this.methods.find(
      (method) => method.name === name && method.type.equals(type)
    );
    if (duplicate !== undefined) {
      const subject = describeMethod(duplicate);
      throw new ElementError(
        `Method ${subject} is already declared in ${this.type.asString()}`,
        'DUPLICATE_METHOD',
        subject
      );
    }
    const builder = new MethodElementBuilder(this, name, flags, type, {
      ...options,
      logger: this.logger,
    });
    block?.(builder);
    const element = builder.build();
    this.methods.push(element);
    return element;
  }

  /**
   * Declares a constructor (`<init>`).
   *
   * @throws ElementError with code `INVALID_CONSTRUCTOR` if the return type
   * of `type` is not void.
   */
  constructorMethod(
    flags: FlagSet<'method'>,
    type: MethodType,
    options: Omit<MethodOptions, 'logger'> = {},
    block?: (builder: MethodElementBuilder) => void
  ): MethodElement {
    this.ensureOpen();
    if (!(type.returnType instanceof VoidType)) {
      throw new ElementError(
        `Return type ${type.returnType.asString()} of a constructor of ${this.type.asString()} must be void`,
        'INVALID_CONSTRUCTOR',
        `${this.type.asString()}::${CONSTRUCTOR_NAME}`
      );
    }
    return this.method(CONSTRUCTOR_NAME, flags, type, options, block);
  }

  /**
   * Declares a no-argument constructor that calls the super constructor.
   *
   * @throws ElementError with code `SUPERTYPE_MISMATCH` unless the supertype
   * is `java.lang.Object`.
   */
  defaultConstructor(flags: FlagSet<'method'> = FlagSet.none<'method'>().plus(PUBLIC)): MethodElement {
    this.ensureOpen();
    if (!this.hasDefaultSupertype) {
      const type = this.type.asString();
      throw new ElementError(
        `Expected supertype java.lang.Object but got ${this.currentSupertype.asString()} in ${type} for default constructor`,
        'SUPERTYPE_MISMATCH',
        type
      );
    }
    const supertype = this.currentSupertype;
    return this.constructorMethod(flags, new MethodType(VoidType.INSTANCE), {}, (method) => {
      method.withBody((body) =>
        body.loadThis().invokeConstructor(supertype, new MethodType(VoidType.INSTANCE)).returnValue()
      );
    });
  }

  /**
   * Declares the static initializer (`<clinit>`).
   */
  staticInit(block?: (builder: MethodElementBuilder) => void): MethodElement {
    return this.method(
      STATIC_INIT_NAME,
      FlagSet.none<'method'>().plus(STATIC),
      new MethodType(VoidType.INSTANCE),
      {},
      block
    );
  }

  /**
   * Adds an entry to the inner-classes table.
   */
  innerClass(
    type: ReferenceType,
    outerType?: ReferenceType,
    innerName?: string,
    flags: FlagSet<'class'> = FlagSet.none()
  ): this {
    this.ensureOpen();
    this.innerClasses.push(Object.freeze({ type, outerType, innerName, flags }));
    return this;
  }

  nestHost(type: ReferenceType): this {
    this.ensureOpen();
    this.host = type;
    return this;
  }

  nestMate(type: ReferenceType): this {
    this.ensureOpen();
    this.nestMates.push(type);
    return this;
  }

  enclosingClass(type: ReferenceType): this {
    this.ensureOpen();
    this.outerClass = type;
    return this;
  }

  enclosingMethod(owner: ReferenceType, name: string, type: MethodType): this {
    this.ensureOpen();
    this.outerMethod = Object.freeze({ owner, name, type });
    return this;
  }

  // -- Validation --

  /**
   * Runs the state rules. With unchanged state every call has the same
   * outcome.
   *
   * @throws ClassValidationError with phase `state` carrying every violation.
   */
  verifyState(): void {
    this.assertPhase('state', checkState(this.shape()));
    if (this.lifecycle === 'open') {
      this.lifecycle = 'verified';
    }
  }

  /**
   * Runs the build rules.
   *
   * @throws ClassValidationError with phase `build` carrying every violation.
   */
  verifyStateBeforeBuild(): void {
    this.assertPhase('build', checkBeforeBuild(this.shape()));
  }

  /**
   * Runs both rule phases without throwing.
   */
  validate(): ClassValidationResult {
    return validateClassShape(this.shape());
  }

  /**
   * Verifies the class and produces the element. The builder is frozen
   * afterwards.
   */
  build(): ClassElement {
    this.ensureOpen();
    this.verifyState();
    this.verifyStateBeforeBuild();
    const element: ClassElement = {
      version: this.currentVersion,
      kind: this.currentKind,
      type: this.type,
      flags: this.currentFlags,
      signature: this.signature,
      supertype: this.currentSupertype,
      interfaces: Object.freeze([...this.interfaces]),
      sourceFile: this.sourceFile,
      sourceDebug: this.sourceDebug,
      permittedSubtypes: Object.freeze([...this.permittedSubtypes]),
      enclosingMethod: this.outerMethod,
      enclosingClass: this.outerClass,
      innerClasses: Object.freeze([...this.innerClasses]),
      nestHost: this.host,
      nestMates: Object.freeze([...this.nestMates]),
      fields: new Map(this.fields),
      methods: Object.freeze([...this.methods]),
      treatSuperSpecially: this.superSpecial,
      annotations: this.annotations.build(),
      typeAnnotations: this.typeAnnotations.build(),
    };
    this.freeze();
    this.lifecycle = 'built';
    this.logger?.debug('class_built', {
      type: this.type.asString(),
      kind: this.currentKind,
      version: this.currentVersion,
      fields: this.fields.size,
      methods: this.methods.length,
    });
    return Object.freeze(element);
  }

  private shape(): ClassShape {
    return {
      version: this.currentVersion,
      kind: this.currentKind,
      type: this.type,
      flags: this.currentFlags,
      supertype: this.currentSupertype,
      permittedSubtypes: this.permittedSubtypes,
      fields: this.fields,
      methods: this.methods,
    };
  }

  private assertPhase(phase: ValidationPhase, violations: ClassValidationResult['violations']): void {
    if (violations.length === 0) {
      return;
    }
    this.logger?.debug('class_validation_failed', {
      type: this.type.asString(),
      phase,
      codes: violations.map((v) => v.code),
    });
    throw new ClassValidationError(this.type.asString(), phase, violations);
  }

  private change(apply: () => void, revert: () => void): void {
    this.ensureOpen();
    apply();
    try {
      this.verifyState();
    } catch (error) {
      revert();
      throw error;
    }
  }
}

/**
 * Creates a class builder, runs `block` exactly once and builds.
 *
 * @example
 * ```typescript
 * const element = buildClassElement(
 *   { version: 'RELEASE_17', kind: 'interface', type: ReferenceType.of('com.example.Shape') },
 *   (shape) => {
 *     shape.method('area', flagsOf(PUBLIC, ABSTRACT), new MethodType(PrimitiveType.DOUBLE));
 *   }
 * );
 * ```
 */
export function buildClassElement(
  options: ClassElementOptions,
  block?: (builder: ClassElementBuilder) => void
): ClassElement {
  const builder = new ClassElementBuilder(options);
  block?.(builder);
  return builder.build();
}
