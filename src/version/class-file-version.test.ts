import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  CLASS_FILE_VERSIONS,
  compareVersions,
  isAtLeast,
  isClassFileVersion,
  majorVersion,
  minorVersion,
  parseClassFileVersion,
  RECORDS_VERSION,
} from './index.js';

const anyVersion = fc.constantFrom(...CLASS_FILE_VERSIONS);

describe('class-file versions', () => {
  it('should map releases to major versions', () => {
    expect(majorVersion('RELEASE_1')).toBe(45);
    expect(minorVersion('RELEASE_1')).toBe(3);
    expect(majorVersion('RELEASE_8')).toBe(52);
    expect(majorVersion('RELEASE_17')).toBe(61);
    expect(majorVersion('RELEASE_22')).toBe(66);
    expect(minorVersion('RELEASE_22')).toBe(0);
  });

  it('should order versions totally', () => {
    fc.assert(
      fc.property(anyVersion, anyVersion, (a, b) => {
        expect(Math.sign(compareVersions(a, b)) + Math.sign(compareVersions(b, a))).toBe(0);
        expect(isAtLeast(a, b) || isAtLeast(b, a)).toBe(true);
        expect(isAtLeast(a, b)).toBe(majorVersion(a) >= majorVersion(b));
      })
    );
  });

  it('should gate records at release 14', () => {
    expect(isAtLeast('RELEASE_13', RECORDS_VERSION)).toBe(false);
    expect(isAtLeast('RELEASE_14', RECORDS_VERSION)).toBe(true);
  });

  describe('parseClassFileVersion', () => {
    it('should accept tags and release numbers', () => {
      expect(parseClassFileVersion('RELEASE_11')).toBe('RELEASE_11');
      expect(parseClassFileVersion('release_11')).toBe('RELEASE_11');
      expect(parseClassFileVersion('17')).toBe('RELEASE_17');
      expect(parseClassFileVersion(' 1.8 ')).toBe('RELEASE_8');
    });

    it('should return undefined for unsupported text', () => {
      expect(parseClassFileVersion('23')).toBeUndefined();
      expect(parseClassFileVersion('0')).toBeUndefined();
      expect(parseClassFileVersion('latest')).toBeUndefined();
    });
  });

  it('should recognise tags only', () => {
    expect(isClassFileVersion('RELEASE_9')).toBe(true);
    expect(isClassFileVersion('9')).toBe(false);
  });
});
