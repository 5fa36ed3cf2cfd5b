import { describe, it, expect } from 'vitest';
import {
  buildClassElement,
  createElementFactory,
  flagsOf,
  forInt,
  FINAL,
  PrimitiveType,
  PUBLIC,
  ReferenceType,
  STATIC,
  VERSION,
} from './index.js';

describe('classwright', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  it('should build an interface of constants through the package entry point', () => {
    const limits = buildClassElement(
      { version: 'RELEASE_17', kind: 'interface', type: ReferenceType.of('com.example.Limits') },
      (builder) => {
        builder.field('MAX', flagsOf(PUBLIC, STATIC, FINAL), PrimitiveType.INT, {
          initialValue: forInt(100),
        });
      }
    );

    expect(limits.fields.get('MAX')?.initialValue).toEqual(forInt(100));
  });

  it('should expose the element factory', () => {
    expect(createElementFactory().config.logging.component).toBe('classwright');
  });
});
