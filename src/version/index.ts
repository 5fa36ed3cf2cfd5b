/**
 * Class-file format versions.
 *
 * @packageDocumentation
 */

export {
  CLASS_FILE_VERSIONS,
  compareVersions,
  DEFAULT_CLASS_FILE_VERSION,
  isAtLeast,
  isClassFileVersion,
  majorVersion,
  minorVersion,
  MODULES_VERSION,
  parseClassFileVersion,
  RECORDS_VERSION,
  SEALED_TYPES_VERSION,
  versionOrdinal,
} from './class-file-version.js';
export type { ClassFileVersion } from './class-file-version.js';
