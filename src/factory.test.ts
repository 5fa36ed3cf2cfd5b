import { describe, expect, it, vi } from 'vitest';
import { ConfigValidationError, DEFAULT_CONFIG, type Config } from './config/index.js';
import { PrimitiveType, ReferenceType } from './descriptors/index.js';
import { flagsOf, PRIVATE } from './flags/index.js';
import { createElementFactory } from './factory.js';
import type { ClassElementBuilder } from './builders/index.js';

const POINT = ReferenceType.of('com.example.Point');

function configWith(builder: Partial<Config['builder']>, debug = false): Config {
  return {
    builder: { ...DEFAULT_CONFIG.builder, ...builder },
    logging: { ...DEFAULT_CONFIG.logging, debug },
  };
}

describe('createElementFactory', () => {
  it('should apply the default configuration', () => {
    const factory = createElementFactory();

    const builder = factory.classBuilder({ kind: 'class', type: POINT });

    expect(builder.version).toBe('RELEASE_17');
    expect(builder.flags.asInt()).toBe(0x0001);
    expect(builder.treatSuperSpecially).toBe(true);
    expect(factory.logger.isDebugEnabled).toBe(false);
  });

  it('should fill builders from the configured defaults', () => {
    const factory = createElementFactory(
      configWith(
        { default_version: 'RELEASE_11', treat_super_specially: false, default_class_flags: ['PUBLIC', 'FINAL'] },
        true
      )
    );

    const builder = factory.classBuilder({ kind: 'class', type: POINT });

    expect(builder.version).toBe('RELEASE_11');
    expect(builder.flags.asInt()).toBe(0x0011);
    expect(builder.treatSuperSpecially).toBe(false);
    expect(factory.defaultClassFlags.asInt()).toBe(0x0011);
    expect(factory.logger.isDebugEnabled).toBe(true);
  });

  it('should let explicit options win over the defaults', () => {
    const factory = createElementFactory(configWith({ default_version: 'RELEASE_11' }));

    const builder = factory.classBuilder({
      kind: 'record',
      type: POINT,
      version: 'RELEASE_17',
      supertype: ReferenceType.RECORD,
      flags: flagsOf(PRIVATE),
      treatSuperSpecially: false,
    });

    expect(builder.version).toBe('RELEASE_17');
    expect(builder.flags.asInt()).toBe(0x0002);
    expect(builder.treatSuperSpecially).toBe(false);
  });

  it('should reject invalid configuration', () => {
    expect(() => createElementFactory(configWith({ default_class_flags: ['INTERFACE'] }))).toThrow(
      ConfigValidationError
    );
  });

  it('should run the build block exactly once', () => {
    const factory = createElementFactory();
    const block = vi.fn((builder: ClassElementBuilder) => {
      builder.field('x', flagsOf(PRIVATE), PrimitiveType.INT);
    });

    const element = factory.buildClass({ kind: 'class', type: POINT }, block);

    expect(block).toHaveBeenCalledTimes(1);
    expect([...element.fields.keys()]).toEqual(['x']);
    expect(element.version).toBe('RELEASE_17');
  });
});
