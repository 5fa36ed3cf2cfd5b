/**
 * Flag algebra: named flags and immutable, target-tagged flag sets.
 *
 * @packageDocumentation
 */

export {
  ABSTRACT,
  ALL_FLAGS,
  ANNOTATION,
  BRIDGE,
  DEPRECATED,
  ENUM,
  FINAL,
  findFlag,
  FLAG_TARGETS,
  flagsForTarget,
  INTERFACE,
  isFlagFor,
  MANDATED,
  MODULE,
  NATIVE,
  OPEN,
  PRIVATE,
  PROTECTED,
  PUBLIC,
  RECORD,
  STATIC,
  STATIC_PHASE,
  STRICT,
  SUPER,
  SYNCHRONIZED,
  SYNTHETIC,
  TRANSIENT,
  TRANSITIVE,
  VARARGS,
  VOLATILE,
} from './access-flag.js';
export type { AccessFlag, FlagTarget } from './access-flag.js';
export { FlagSet, flagsOf } from './flag-set.js';
