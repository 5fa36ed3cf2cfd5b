/**
 * Class kinds and the kind sets the structural rules are phrased over.
 *
 * @packageDocumentation
 */

import {
  ABSTRACT,
  ANNOTATION,
  ENUM,
  INTERFACE,
  MODULE,
  RECORD,
  type AccessFlag,
} from '../flags/index.js';

/**
 * The category of a class. Each kind except `class` is encoded by one flag
 * bit, which callers set through the kind rather than in the flag set.
 */
export type ClassKind =
  | 'class'
  | 'abstract-class'
  | 'interface'
  | 'annotation'
  | 'enum'
  | 'record'
  | 'module';

/**
 * All kinds, in declaration order.
 */
export const CLASS_KINDS: readonly ClassKind[] = [
  'class',
  'abstract-class',
  'interface',
  'annotation',
  'enum',
  'record',
  'module',
];

/**
 * The flag each kind is encoded by.
 */
export const KIND_FLAGS: Readonly<Record<ClassKind, AccessFlag<'class'> | undefined>> = {
  class: undefined,
  'abstract-class': ABSTRACT,
  interface: INTERFACE,
  annotation: ANNOTATION,
  enum: ENUM,
  record: RECORD,
  module: MODULE,
};

/** Kinds that may be subclassed, and so may declare permitted subtypes. */
export const INHERITABLE_KINDS: ReadonlySet<ClassKind> = new Set<ClassKind>([
  'class',
  'abstract-class',
  'interface',
]);

/** Kinds that may not declare fields. */
export const NO_FIELD_KINDS: ReadonlySet<ClassKind> = new Set<ClassKind>(['annotation', 'module']);

/** Kinds that may not declare methods. */
export const NO_METHOD_KINDS: ReadonlySet<ClassKind> = new Set<ClassKind>(['module']);

/** Kinds that may declare abstract methods. */
export const ABSTRACT_METHOD_KINDS: ReadonlySet<ClassKind> = new Set<ClassKind>([
  'abstract-class',
  'interface',
]);

export function isClassKind(value: string): value is ClassKind {
  return CLASS_KINDS.some((kind) => kind === value);
}

/**
 * Renders a kind set for messages, e.g. `class, abstract-class or interface`.
 */
export function listKinds(kinds: ReadonlySet<ClassKind>): string {
  const names = [...kinds];
  const last = names.pop();
  if (last === undefined) {
    return '';
  }
  return names.length === 0 ? last : `${names.join(', ')} or ${last}`;
}
