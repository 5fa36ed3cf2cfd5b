/**
 * Supported class-file format versions and feature gates.
 *
 * @packageDocumentation
 */

/**
 * Version tags in ascending order.
 */
export const CLASS_FILE_VERSIONS = [
  'RELEASE_1',
  'RELEASE_2',
  'RELEASE_3',
  'RELEASE_4',
  'RELEASE_5',
  'RELEASE_6',
  'RELEASE_7',
  'RELEASE_8',
  'RELEASE_9',
  'RELEASE_10',
  'RELEASE_11',
  'RELEASE_12',
  'RELEASE_13',
  'RELEASE_14',
  'RELEASE_15',
  'RELEASE_16',
  'RELEASE_17',
  'RELEASE_18',
  'RELEASE_19',
  'RELEASE_20',
  'RELEASE_21',
  'RELEASE_22',
] as const;

/**
 * A target class-file format version.
 */
export type ClassFileVersion = (typeof CLASS_FILE_VERSIONS)[number];

/** First version with module descriptors. */
export const MODULES_VERSION: ClassFileVersion = 'RELEASE_9';

/** First version accepting record classes. */
export const RECORDS_VERSION: ClassFileVersion = 'RELEASE_14';

/** First version accepting the `PermittedSubclasses` attribute. */
export const SEALED_TYPES_VERSION: ClassFileVersion = 'RELEASE_16';

/** The version used when neither caller nor configuration picks one. */
export const DEFAULT_CLASS_FILE_VERSION: ClassFileVersion = 'RELEASE_17';

/**
 * Position of a version in the total order.
 */
export function versionOrdinal(version: ClassFileVersion): number {
  return CLASS_FILE_VERSIONS.indexOf(version);
}

/**
 * Compares two versions: negative, zero or positive.
 */
export function compareVersions(a: ClassFileVersion, b: ClassFileVersion): number {
  return versionOrdinal(a) - versionOrdinal(b);
}

/**
 * Whether `version >= minimum`.
 */
export function isAtLeast(version: ClassFileVersion, minimum: ClassFileVersion): boolean {
  return compareVersions(version, minimum) >= 0;
}

/**
 * The class-file major version number (`RELEASE_8` is 52).
 */
export function majorVersion(version: ClassFileVersion): number {
  return 45 + versionOrdinal(version);
}

/**
 * The class-file minor version number; only `RELEASE_1` has a non-zero one.
 */
export function minorVersion(version: ClassFileVersion): number {
  return version === 'RELEASE_1' ? 3 : 0;
}

/**
 * Type guard for version tags.
 */
export function isClassFileVersion(value: string): value is ClassFileVersion {
  return CLASS_FILE_VERSIONS.some((version) => version === value);
}

/**
 * Parses a version tag (`RELEASE_17`) or release number (`17`, `1.8`).
 *
 * @returns The version, or `undefined` when the text names no supported version.
 *
 * @example
 * ```typescript
 * parseClassFileVersion('RELEASE_11'); // 'RELEASE_11'
 * parseClassFileVersion('1.8');        // 'RELEASE_8'
 * parseClassFileVersion('23');         // undefined
 * ```
 */
export function parseClassFileVersion(text: string): ClassFileVersion | undefined {
  const trimmed = text.trim().toUpperCase();
  if (isClassFileVersion(trimmed)) {
    return trimmed;
  }
  const match = /^(?:1\.)?(\d+)$/.exec(trimmed);
  if (match?.[1] === undefined) {
    return undefined;
  }
  const candidate = `RELEASE_${String(Number(match[1]))}`;
  return isClassFileVersion(candidate) ? candidate : undefined;
}
