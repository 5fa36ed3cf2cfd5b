/**
 * Error types raised while building and validating class elements.
 *
 * Every failure is synchronous and local: builders never retry or recover.
 * Single failures raise {@link ElementError}; rule phases that can find several
 * violations at once raise {@link ClassValidationError} carrying all of them.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling of element failures.
 */
export type ElementErrorCode =
  | 'REDUNDANT_KIND_FLAG'
  | 'SUPERTYPE_MISMATCH'
  | 'VERSION_TOO_LOW'
  | 'KIND_NOT_ALLOWED'
  | 'INTERFACE_FIELD_MODIFIER_VIOLATION'
  | 'ABSTRACT_METHOD_NOT_ALLOWED'
  | 'MISSING_METHOD_BODY'
  | 'ABSTRACT_METHOD_HAS_BODY'
  | 'DUPLICATE_ANNOTATION'
  | 'VALUE_SHAPE'
  | 'DEFAULT_VALUE_ON_NON_ANNOTATION'
  | 'INVALID_VALUE'
  | 'DUPLICATE_FIELD'
  | 'DUPLICATE_METHOD'
  | 'INVALID_CONSTRUCTOR'
  | 'BUILDER_FROZEN';

/**
 * Error class for a single element failure.
 */
export class ElementError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ElementErrorCode;
  /** The rendered name or type of the offending entity. */
  public readonly subject: string;

  constructor(message: string, code: ElementErrorCode, subject: string) {
    super(message);
    this.name = 'ElementError';
    this.code = code;
    this.subject = subject;
  }
}

/**
 * Raised when a host annotation property holds a value that has no
 * annotation value variant.
 */
export class ValueShapeError extends ElementError {
  /** Dotted path of the offending property, e.g. `route.methods`. */
  public readonly property: string;
  /** The runtime type that was encountered, e.g. `null` or `Date`. */
  public readonly runtimeType: string;

  constructor(property: string, runtimeType: string, expected?: string) {
    const suffix = expected === undefined ? '' : `, expected ${expected}`;
    super(
      `Property '${property}' has unsupported value of type ${runtimeType}${suffix}`,
      'VALUE_SHAPE',
      property
    );
    this.name = 'ValueShapeError';
    this.property = property;
    this.runtimeType = runtimeType;
  }
}

/**
 * Codes a rule violation may carry.
 */
export type RuleViolationCode = Extract<
  ElementErrorCode,
  | 'REDUNDANT_KIND_FLAG'
  | 'SUPERTYPE_MISMATCH'
  | 'VERSION_TOO_LOW'
  | 'KIND_NOT_ALLOWED'
  | 'INTERFACE_FIELD_MODIFIER_VIOLATION'
  | 'ABSTRACT_METHOD_NOT_ALLOWED'
  | 'MISSING_METHOD_BODY'
  | 'ABSTRACT_METHOD_HAS_BODY'
  | 'DEFAULT_VALUE_ON_NON_ANNOTATION'
>;

/**
 * One structural rule violation.
 */
export interface RuleViolation {
  /** Which rule was violated. */
  readonly code: RuleViolationCode;
  /** The offending class, field or method, rendered. */
  readonly subject: string;
  /** The gated feature for kind and version rules, e.g. `fields`. */
  readonly feature?: string | undefined;
  /** Human-readable description naming the subject. */
  readonly message: string;
}

/**
 * The rule phase a violation list came from.
 */
export type ValidationPhase = 'state' | 'build';

/**
 * Error class for a failed rule phase.
 */
export class ClassValidationError extends Error {
  /** Phase that produced the violations. */
  public readonly phase: ValidationPhase;
  /** Every violation found, in rule order. */
  public readonly violations: readonly RuleViolation[];
  /** The class the violations belong to. */
  public readonly subject: string;

  constructor(subject: string, phase: ValidationPhase, violations: readonly RuleViolation[]) {
    const lines = violations.map((v) => `  - [${v.code}] ${v.message}`).join('\n');
    super(
      `Class '${subject}' failed ${phase} validation with ${String(violations.length)} violation(s):\n${lines}`
    );
    this.name = 'ClassValidationError';
    this.phase = phase;
    this.violations = violations;
    this.subject = subject;
  }

  /** The violation codes in rule order. */
  get codes(): RuleViolationCode[] {
    return this.violations.map((v) => v.code);
  }
}

/**
 * Describes the runtime type of a value for diagnostics.
 *
 * @example
 * ```typescript
 * describeRuntimeType(null);        // "null"
 * describeRuntimeType([1]);         // "Array"
 * describeRuntimeType(new Date());  // "Date"
 * describeRuntimeType(3);           // "number"
 * ```
 */
export function describeRuntimeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'Array';
  }
  if (typeof value === 'object') {
    // null-prototype objects have no constructor at runtime
    const ctor: unknown = value.constructor;
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'Object';
  }
  return typeof value;
}
