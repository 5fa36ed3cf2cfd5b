/**
 * Immutable flag sets.
 *
 * @packageDocumentation
 */

import type { AccessFlag, FlagTarget } from './access-flag.js';

/**
 * An immutable bit mask of flags, tagged at type level with the targets `K`
 * every member flag is valid for.
 *
 * Like {@link AccessFlag}, a `FlagSet` is contravariant in `K`: a set built only
 * from flags valid for classes, methods and fields can be passed where a
 * `FlagSet<'field'>` is expected. Union with a flag or set valid for fewer
 * targets narrows the result to the common targets.
 *
 * @example
 * ```typescript
 * const flags = flagsOf(PUBLIC, STATIC).plus(FINAL);
 * flags.contains(STATIC); // true
 * flags.asInt();          // 0x19
 * ```
 */
export class FlagSet<K extends FlagTarget> {
  /** Type-level marker only, never assigned. */
  private readonly __targets?: (target: K) => void;

  private constructor(private readonly mask: number) {}

  /**
   * The empty set.
   */
  static none<K extends FlagTarget>(): FlagSet<K> {
    return new FlagSet<K>(0);
  }

  /**
   * Creates a set from raw bits, as read back from an encoded class.
   *
   * @throws Error if `mask` is not a non-negative 32-bit integer.
   */
  static fromMask<K extends FlagTarget>(mask: number): FlagSet<K> {
    if (!Number.isInteger(mask) || mask < 0 || mask > 0xffffffff) {
      throw new Error(`Flag mask must be a non-negative 32-bit integer, got ${String(mask)}`);
    }
    return new FlagSet<K>(mask);
  }

  /**
   * Union with a single flag or another set.
   */
  plus<F extends FlagTarget>(other: AccessFlag<F> | FlagSet<F>): FlagSet<K & F> {
    const bits = other instanceof FlagSet ? other.asInt() : other.mask;
    return new FlagSet<K & F>((this.mask | bits) >>> 0);
  }

  /**
   * Whether every bit of `flag` is set.
   */
  contains(flag: AccessFlag<K>): boolean {
    return flag.mask !== 0 && (this.mask & flag.mask) === flag.mask;
  }

  /**
   * Whether the two sets share at least one bit.
   */
  containsAny(other: FlagSet<K>): boolean {
    return (this.mask & other.mask) !== 0;
  }

  /** Whether no bit is set. */
  get isEmpty(): boolean {
    return this.mask === 0;
  }

  /**
   * The names of `candidates` contained in this set, in candidate order.
   */
  namesOf(candidates: readonly AccessFlag<K>[]): string[] {
    return candidates.filter((flag) => this.contains(flag)).map((flag) => flag.name);
  }

  equals(other: FlagSet<K>): boolean {
    return this.mask === other.mask;
  }

  asInt(): number {
    return this.mask;
  }

  toString(): string {
    return `0x${this.mask.toString(16).toUpperCase().padStart(8, '0')}`;
  }
}

/**
 * Combines flags into a set (`flag + flag`).
 *
 * @example
 * ```typescript
 * const fieldFlags: FlagSet<'field'> = flagsOf(PUBLIC, STATIC, FINAL);
 * ```
 */
export function flagsOf<K extends FlagTarget>(...flags: readonly AccessFlag<K>[]): FlagSet<K> {
  let set = FlagSet.none<K>();
  for (const flag of flags) {
    set = set.plus(flag);
  }
  return set;
}
