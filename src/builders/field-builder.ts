/**
 * Builders for fields and method parameters.
 *
 * @packageDocumentation
 */

import type { FieldType, ReferenceType } from '../descriptors/index.js';
import { describeField } from '../elements/describe.js';
import type { FieldElement, FieldInitialValue, ParameterElement } from '../elements/types.js';
import { ElementError } from '../errors/index.js';
import { FlagSet } from '../flags/index.js';
import type { Logger } from '../utils/logger.js';
import { renderValue } from '../values/render.js';
import type { AnnotationValue } from '../values/types.js';
import { AnnotatableElementBuilder } from './annotatable.js';

function checkInitialValue(value: AnnotationValue, subject: string): FieldInitialValue {
  switch (value.kind) {
    case 'Int':
    case 'Long':
    case 'Float':
    case 'Double':
    case 'String':
      return value;
    default:
      throw new ElementError(
        `Initial value ${renderValue(value)} of ${subject} must be an int, long, float, double or string`,
        'INVALID_VALUE',
        subject
      );
  }
}

export interface FieldOptions {
  readonly signature?: string | undefined;
  /** Constant value; int, long, float, double or string. */
  readonly initialValue?: AnnotationValue | undefined;
  readonly logger?: Logger | undefined;
}

export class FieldElementBuilder extends AnnotatableElementBuilder {
  readonly signature: string | undefined;
  private constantValue: FieldInitialValue | undefined;

  constructor(
    readonly owner: ReferenceType,
    readonly name: string,
    readonly flags: FlagSet<'field'>,
    readonly type: FieldType,
    options: FieldOptions = {}
  ) {
    super(options.logger);
    this.signature = options.signature;
    if (options.initialValue !== undefined) {
      this.initialValue(options.initialValue);
    }
  }

  protected describe(): string {
    return `Field ${describeField(this)}`;
  }

  /**
   * Sets or clears the constant value.
   *
   * @throws ElementError with code `INVALID_VALUE` for any other variant than
   * int, long, float, double or string.
   */
  initialValue(value: AnnotationValue | undefined): this {
    this.ensureOpen();
    this.constantValue =
      value === undefined ? undefined : checkInitialValue(value, describeField(this));
    return this;
  }

  build(): FieldElement {
    this.ensureOpen();
    this.freeze();
    return Object.freeze({
      owner: this.owner,
      name: this.name,
      flags: this.flags,
      type: this.type,
      initialValue: this.constantValue,
      signature: this.signature,
      annotations: this.annotations.build(),
      typeAnnotations: this.typeAnnotations.build(),
    });
  }
}

export class ParameterElementBuilder extends AnnotatableElementBuilder {
  constructor(
    readonly index: number,
    readonly name: string,
    readonly flags: FlagSet<'parameter'> = FlagSet.none(),
    logger?: Logger | undefined
  ) {
    super(logger);
  }

  protected describe(): string {
    return `Parameter '${this.name}' (#${String(this.index)})`;
  }

  build(): ParameterElement {
    this.ensureOpen();
    this.freeze();
    return Object.freeze({
      index: this.index,
      name: this.name,
      flags: this.flags,
      annotations: this.annotations.build(),
      typeAnnotations: this.typeAnnotations.build(),
    });
  }
}

/**
 * Builds a field, running `block` exactly once.
 */
export function buildFieldElement(
  owner: ReferenceType,
  name: string,
  flags: FlagSet<'field'>,
  type: FieldType,
  options: FieldOptions = {},
  block?: (builder: FieldElementBuilder) => void
): FieldElement {
  const builder = new FieldElementBuilder(owner, name, flags, type, options);
  block?.(builder);
  return builder.build();
}

/**
 * Builds a parameter, running `block` exactly once.
 */
export function buildParameterElement(
  index: number,
  name: string,
  flags: FlagSet<'parameter'> = FlagSet.none(),
  block?: (builder: ParameterElementBuilder) => void,
  logger?: Logger | undefined
): ParameterElement {
  const builder = new ParameterElementBuilder(index, name, flags, logger);
  block?.(builder);
  return builder.build();
}
