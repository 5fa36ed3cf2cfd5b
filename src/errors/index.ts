/**
 * Element error taxonomy.
 *
 * @packageDocumentation
 */

export {
  ClassValidationError,
  describeRuntimeType,
  ElementError,
  ValueShapeError,
} from './errors.js';
export type {
  ElementErrorCode,
  RuleViolation,
  RuleViolationCode,
  ValidationPhase,
} from './errors.js';
