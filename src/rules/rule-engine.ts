/**
 * Structural rules for class elements.
 *
 * Rules are pure functions over a read-only snapshot of a class. They are
 * grouped into two ordered phases:
 * - state rules, run whenever kind, version, flags or supertype change
 * - build rules, run once more before an element is produced
 *
 * Every rule of a phase runs and the violations are collected in table order,
 * so one failed phase reports all of its problems together.
 *
 * @packageDocumentation
 */

import { ReferenceType } from '../descriptors/index.js';
import { describeField, describeMethod } from '../elements/describe.js';
import { isLabelOnly } from '../elements/instructions.js';
import type { ClassElement, FieldElement, MethodElement } from '../elements/types.js';
import {
  ClassValidationError,
  type RuleViolation,
  type RuleViolationCode,
  type ValidationPhase,
} from '../errors/index.js';
import { ABSTRACT, FINAL, PUBLIC, STATIC } from '../flags/index.js';
import {
  isAtLeast,
  MODULES_VERSION,
  RECORDS_VERSION,
  SEALED_TYPES_VERSION,
  type ClassFileVersion,
} from '../version/index.js';
import {
  ABSTRACT_METHOD_KINDS,
  CLASS_KINDS,
  INHERITABLE_KINDS,
  KIND_FLAGS,
  listKinds,
  NO_FIELD_KINDS,
  NO_METHOD_KINDS,
  type ClassKind,
} from './class-kind.js';

/**
 * The parts of a class the rules look at. A built {@link ClassElement} is a
 * valid shape, so elements can be re-checked after the fact.
 */
export type ClassShape = Pick<
  ClassElement,
  'version' | 'kind' | 'type' | 'flags' | 'supertype' | 'permittedSubtypes' | 'fields' | 'methods'
>;

/**
 * A named structural rule.
 */
export interface ClassRule {
  /** Short identifier, e.g. `record-supertype`. */
  readonly name: string;
  check(shape: ClassShape): RuleViolation[];
}

/**
 * Result of running both phases without throwing.
 */
export interface ClassValidationResult {
  valid: boolean;
  /** State violations first, then build violations. */
  violations: RuleViolation[];
}

function violation(
  code: RuleViolationCode,
  subject: string,
  message: string,
  feature?: string
): RuleViolation {
  return { code, subject, feature, message };
}

function requireSupertype(
  shape: ClassShape,
  expected: ReferenceType,
  feature: string
): RuleViolation[] {
  if (shape.supertype.equals(expected)) {
    return [];
  }
  const type = shape.type.asString();
  return [
    violation(
      'SUPERTYPE_MISMATCH',
      type,
      `${feature} require supertype ${expected.asString()}, but the supertype of ${type} is ${shape.supertype.asString()}`,
      feature
    ),
  ];
}

function requireVersion(
  shape: ClassShape,
  minimum: ClassFileVersion,
  feature: string
): RuleViolation[] {
  if (isAtLeast(shape.version, minimum)) {
    return [];
  }
  const type = shape.type.asString();
  return [
    violation(
      'VERSION_TOO_LOW',
      type,
      `${feature} require class-file version ${minimum} or later, but ${type} targets ${shape.version}`,
      feature
    ),
  ];
}

function requireKindIn(
  shape: ClassShape,
  kinds: ReadonlySet<ClassKind>,
  feature: string
): RuleViolation[] {
  if (kinds.has(shape.kind)) {
    return [];
  }
  const type = shape.type.asString();
  return [
    violation(
      'KIND_NOT_ALLOWED',
      type,
      `Only classes of kind ${listKinds(kinds)} may have ${feature}, but ${type} is of kind ${shape.kind}`,
      feature
    ),
  ];
}

function requireKindNotIn(
  shape: ClassShape,
  kinds: ReadonlySet<ClassKind>,
  feature: string
): RuleViolation[] {
  if (!kinds.has(shape.kind)) {
    return [];
  }
  const type = shape.type.asString();
  return [
    violation(
      'KIND_NOT_ALLOWED',
      type,
      `Classes of kind ${shape.kind} may not have ${feature}, but ${type} does`,
      feature
    ),
  ];
}

function checkInterfaceField(shape: ClassShape, field: FieldElement): RuleViolation[] {
  const missing = [PUBLIC, STATIC, FINAL]
    .filter((flag) => !field.flags.contains(flag))
    .map((flag) => flag.name.toLowerCase());
  if (missing.length === 0) {
    return [];
  }
  const subject = describeField(field);
  return [
    violation(
      'INTERFACE_FIELD_MODIFIER_VIOLATION',
      subject,
      `Interface fields must be public, static and final, but field '${field.name}' of ${shape.type.asString()} is not ${missing.join(', ')}`
    ),
  ];
}

function checkMethod(shape: ClassShape, method: MethodElement): RuleViolation[] {
  const isAbstract = method.flags.contains(ABSTRACT);
  const subject = describeMethod(method);
  const type = shape.type.asString();
  const violations: RuleViolation[] = [];
  if (isAbstract && !ABSTRACT_METHOD_KINDS.has(shape.kind)) {
    violations.push(
      violation(
        'ABSTRACT_METHOD_NOT_ALLOWED',
        subject,
        `Abstract method ${subject} is only allowed in classes of kind ${listKinds(ABSTRACT_METHOD_KINDS)}, but ${type} is of kind ${shape.kind}`,
        'abstract methods'
      )
    );
  }
  if (!isAbstract && method.body.length === 0) {
    violations.push(
      violation(
        'MISSING_METHOD_BODY',
        subject,
        `No instructions defined for non-abstract method ${subject} in ${type}`
      )
    );
  }
  if (isAbstract && method.body.length > 0 && !isLabelOnly(method.body)) {
    violations.push(
      violation(
        'ABSTRACT_METHOD_HAS_BODY',
        subject,
        `Abstract method ${subject} in ${type} contains instructions`
      )
    );
  }
  if (method.defaultValue !== undefined && shape.kind !== 'annotation') {
    violations.push(
      violation(
        'DEFAULT_VALUE_ON_NON_ANNOTATION',
        subject,
        `Method ${subject} declares a default value, but ${type} is of kind ${shape.kind}, not annotation`
      )
    );
  }
  return violations;
}

/**
 * Rules run on every change of kind, version, flags or supertype.
 */
export const STATE_RULES: readonly ClassRule[] = [
  {
    name: 'redundant-kind-flag',
    check: (shape) => {
      const type = shape.type.asString();
      return CLASS_KINDS.flatMap((kind) => {
        const flag = KIND_FLAGS[kind];
        if (flag === undefined || !shape.flags.contains(flag)) {
          return [];
        }
        return [
          violation(
            'REDUNDANT_KIND_FLAG',
            type,
            `Flag '${flag.name}' found in the flags of ${type}, set kind to '${kind}' instead`
          ),
        ];
      });
    },
  },
  {
    name: 'enum-supertype',
    check: (shape) =>
      shape.kind === 'enum' ? requireSupertype(shape, ReferenceType.ENUM, 'Enum classes') : [],
  },
  {
    name: 'module-version',
    check: (shape) =>
      shape.kind === 'module' ? requireVersion(shape, MODULES_VERSION, 'Modules') : [],
  },
  {
    name: 'record-version',
    check: (shape) =>
      shape.kind === 'record' ? requireVersion(shape, RECORDS_VERSION, 'Record classes') : [],
  },
  {
    name: 'record-supertype',
    check: (shape) =>
      shape.kind === 'record'
        ? requireSupertype(shape, ReferenceType.RECORD, 'Record classes')
        : [],
  },
];

/**
 * Rules run once more before an element is produced.
 */
export const BUILD_RULES: readonly ClassRule[] = [
  {
    name: 'permitted-subtypes',
    check: (shape) =>
      shape.permittedSubtypes.length === 0
        ? []
        : [
            ...requireVersion(shape, SEALED_TYPES_VERSION, 'Permitted subtypes'),
            ...requireKindIn(shape, INHERITABLE_KINDS, 'permitted subtypes'),
          ],
  },
  {
    name: 'fields',
    check: (shape) => {
      if (shape.fields.size === 0) {
        return [];
      }
      const violations = requireKindNotIn(shape, NO_FIELD_KINDS, 'fields');
      if (shape.kind === 'interface') {
        for (const field of shape.fields.values()) {
          violations.push(...checkInterfaceField(shape, field));
        }
      }
      return violations;
    },
  },
  {
    name: 'interface-supertype',
    check: (shape) =>
      shape.kind === 'interface'
        ? requireSupertype(shape, ReferenceType.OBJECT, 'Interfaces')
        : [],
  },
  {
    name: 'record-supertype',
    check: (shape) =>
      shape.kind === 'record'
        ? requireSupertype(shape, ReferenceType.RECORD, 'Record classes')
        : [],
  },
  {
    name: 'methods',
    check: (shape) => {
      if (shape.methods.length === 0) {
        return [];
      }
      const violations = requireKindNotIn(shape, NO_METHOD_KINDS, 'methods');
      for (const method of shape.methods) {
        violations.push(...checkMethod(shape, method));
      }
      return violations;
    },
  },
];

function runRules(rules: readonly ClassRule[], shape: ClassShape): RuleViolation[] {
  return rules.flatMap((rule) => rule.check(shape));
}

function assertPhase(phase: ValidationPhase, shape: ClassShape, violations: RuleViolation[]): void {
  if (violations.length > 0) {
    throw new ClassValidationError(shape.type.asString(), phase, violations);
  }
}

/**
 * Runs the state rules and returns their violations.
 */
export function checkState(shape: ClassShape): RuleViolation[] {
  return runRules(STATE_RULES, shape);
}

/**
 * Runs the build rules and returns their violations.
 */
export function checkBeforeBuild(shape: ClassShape): RuleViolation[] {
  return runRules(BUILD_RULES, shape);
}

/**
 * Runs the state rules.
 *
 * @throws ClassValidationError with phase `state` carrying every violation.
 */
export function verifyState(shape: ClassShape): void {
  assertPhase('state', shape, checkState(shape));
}

/**
 * Runs the build rules.
 *
 * @throws ClassValidationError with phase `build` carrying every violation.
 */
export function verifyStateBeforeBuild(shape: ClassShape): void {
  assertPhase('build', shape, checkBeforeBuild(shape));
}

/**
 * Runs both phases without throwing.
 *
 * @example
 * ```typescript
 * const result = validateClassShape(element);
 * if (!result.valid) {
 *   console.error(result.violations.map((v) => v.message).join('\n'));
 * }
 * ```
 */
export function validateClassShape(shape: ClassShape): ClassValidationResult {
  const violations = [...checkState(shape), ...checkBeforeBuild(shape)];
  return { valid: violations.length === 0, violations };
}
