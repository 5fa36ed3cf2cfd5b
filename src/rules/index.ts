/**
 * Class kinds and the structural rule engine.
 *
 * @packageDocumentation
 */

export {
  ABSTRACT_METHOD_KINDS,
  CLASS_KINDS,
  INHERITABLE_KINDS,
  isClassKind,
  KIND_FLAGS,
  listKinds,
  NO_FIELD_KINDS,
  NO_METHOD_KINDS,
} from './class-kind.js';
export type { ClassKind } from './class-kind.js';
export {
  BUILD_RULES,
  checkBeforeBuild,
  checkState,
  STATE_RULES,
  validateClassShape,
  verifyState,
  verifyStateBeforeBuild,
} from './rule-engine.js';
export type { ClassRule, ClassShape, ClassValidationResult } from './rule-engine.js';
