/**
 * Access and property flags of the class-file format.
 *
 * Each flag records the entity targets it is valid for. The target set is also
 * carried at type level so that a field flag cannot be combined into a class
 * flag set without a compile error.
 *
 * @packageDocumentation
 */

/**
 * Kinds of entity that carry access flags.
 */
export type FlagTarget = 'class' | 'method' | 'field' | 'module' | 'parameter';

/**
 * All flag targets, in declaration order.
 */
export const FLAG_TARGETS: readonly FlagTarget[] = [
  'class',
  'method',
  'field',
  'module',
  'parameter',
];

/**
 * A single named flag bit.
 *
 * `T` is the union of targets the flag is valid for. It appears only in the
 * parameter of the phantom `__targets` member, which makes `AccessFlag`
 * contravariant in `T`: a flag valid for `'class' | 'field'` is usable wherever
 * an `AccessFlag<'field'>` is expected, but not the other way round. The bare
 * `AccessFlag` (`T = never`) is therefore the type of any flag at all.
 */
export interface AccessFlag<T extends FlagTarget = never> {
  /** Upper-case flag name, e.g. `PUBLIC`. */
  readonly name: string;
  /** Bit mask of the flag. */
  readonly mask: number;
  /** Targets the flag is valid for. */
  readonly targets: readonly FlagTarget[];
  /** Type-level marker only, never present at runtime. */
  readonly __targets?: (target: T) => void;
}

function defineFlag<T extends FlagTarget>(
  name: string,
  mask: number,
  ...targets: T[]
): AccessFlag<T> {
  return Object.freeze({ name, mask, targets: Object.freeze([...targets]) });
}

// -- Shared flags --
export const PUBLIC = defineFlag('PUBLIC', 0x0001, 'class', 'method', 'field');
export const PRIVATE = defineFlag('PRIVATE', 0x0002, 'class', 'method', 'field');
export const PROTECTED = defineFlag('PROTECTED', 0x0004, 'class', 'method', 'field');
export const STATIC = defineFlag('STATIC', 0x0008, 'class', 'method', 'field');
export const FINAL = defineFlag('FINAL', 0x0010, 'class', 'method', 'field', 'parameter');
export const ABSTRACT = defineFlag('ABSTRACT', 0x0400, 'class', 'method');
export const SYNTHETIC = defineFlag(
  'SYNTHETIC',
  0x1000,
  'class',
  'method',
  'field',
  'parameter',
  'module'
);
export const ENUM = defineFlag('ENUM', 0x4000, 'class', 'field');
export const MANDATED = defineFlag('MANDATED', 0x8000, 'method', 'field', 'parameter', 'module');
export const DEPRECATED = defineFlag('DEPRECATED', 0x20000, 'class', 'method', 'field');

// -- Class flags --
export const SUPER = defineFlag('SUPER', 0x0020, 'class');
export const INTERFACE = defineFlag('INTERFACE', 0x0200, 'class');
export const ANNOTATION = defineFlag('ANNOTATION', 0x2000, 'class');
export const MODULE = defineFlag('MODULE', 0x8000, 'class');
export const RECORD = defineFlag('RECORD', 0x10000, 'class');

// -- Method flags --
export const SYNCHRONIZED = defineFlag('SYNCHRONIZED', 0x0020, 'method');
export const BRIDGE = defineFlag('BRIDGE', 0x0040, 'method');
export const VARARGS = defineFlag('VARARGS', 0x0080, 'method');
export const NATIVE = defineFlag('NATIVE', 0x0100, 'method');
export const STRICT = defineFlag('STRICT', 0x0800, 'method');

// -- Field flags --
export const VOLATILE = defineFlag('VOLATILE', 0x0040, 'field');
export const TRANSIENT = defineFlag('TRANSIENT', 0x0080, 'field');

// -- Module flags --
export const OPEN = defineFlag('OPEN', 0x0020, 'module');
export const TRANSITIVE = defineFlag('TRANSITIVE', 0x0020, 'module');
export const STATIC_PHASE = defineFlag('STATIC_PHASE', 0x0040, 'module');

/**
 * Every defined flag, in declaration order.
 */
export const ALL_FLAGS: readonly AccessFlag[] = [
  PUBLIC,
  PRIVATE,
  PROTECTED,
  STATIC,
  FINAL,
  ABSTRACT,
  SYNTHETIC,
  ENUM,
  MANDATED,
  DEPRECATED,
  SUPER,
  INTERFACE,
  ANNOTATION,
  MODULE,
  RECORD,
  SYNCHRONIZED,
  BRIDGE,
  VARARGS,
  NATIVE,
  STRICT,
  VOLATILE,
  TRANSIENT,
  OPEN,
  TRANSITIVE,
  STATIC_PHASE,
];

/**
 * Checks whether a flag is valid for a target, narrowing its type.
 */
export function isFlagFor<T extends FlagTarget>(flag: AccessFlag, target: T): flag is AccessFlag<T> {
  return flag.targets.includes(target);
}

/**
 * Returns the flags valid for a target.
 *
 * @example
 * ```typescript
 * flagsForTarget('parameter').map((f) => f.name); // ['FINAL', 'SYNTHETIC', 'MANDATED']
 * ```
 */
export function flagsForTarget<T extends FlagTarget>(target: T): AccessFlag<T>[] {
  return ALL_FLAGS.filter((flag): flag is AccessFlag<T> => isFlagFor(flag, target));
}

/**
 * Looks up a flag by name for a target, or returns `undefined`.
 *
 * Names are matched case-insensitively. Used to read flag lists from
 * configuration.
 */
export function findFlag<T extends FlagTarget>(name: string, target: T): AccessFlag<T> | undefined {
  const upper = name.toUpperCase();
  return ALL_FLAGS.find(
    (flag): flag is AccessFlag<T> => flag.name === upper && isFlagFor(flag, target)
  );
}
