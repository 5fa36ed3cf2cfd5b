import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { CLASS_FILE_VERSIONS } from '../version/index.js';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  loadConfig,
  parseConfig,
} from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[builder]
default_version = "RELEASE_11"
treat_super_specially = false
default_class_flags = ["PUBLIC", "FINAL"]

[logging]
debug = true
component = "codegen"
`;
        const config = parseConfig(toml);

        expect(config.builder.default_version).toBe('RELEASE_11');
        expect(config.builder.treat_super_specially).toBe(false);
        expect(config.builder.default_class_flags).toEqual(['PUBLIC', 'FINAL']);
        expect(config.logging.debug).toBe(true);
        expect(config.logging.component).toBe('codegen');
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig('[logging]\ndebug = true\n');

        expect(config.logging).toEqual({ debug: true, component: 'classwright' });
        expect(config.builder).toEqual(DEFAULT_CONFIG.builder);
      });

      it('should accept release numbers for the default version', () => {
        expect(parseConfig('[builder]\ndefault_version = "1.8"\n').builder.default_version).toBe(
          'RELEASE_8'
        );
        expect(parseConfig('[builder]\ndefault_version = 21\n').builder.default_version).toBe(
          'RELEASE_21'
        );
      });

      it('should accept every supported version tag', () => {
        fc.assert(
          fc.property(fc.constantFrom(...CLASS_FILE_VERSIONS), (version) => {
            const config = parseConfig(`[builder]\ndefault_version = "${version}"\n`);
            expect(config.builder.default_version).toBe(version);
          })
        );
      });

      it('should ignore unknown sections', () => {
        expect(parseConfig('[extras]\nanything = 1\n')).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid input', () => {
      it('should throw ConfigParseError for invalid TOML syntax', () => {
        expect(() => parseConfig('[builder')).toThrow(ConfigParseError);
        expect(() => parseConfig('[builder')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should keep the underlying TOML error as cause', () => {
        try {
          parseConfig('[builder');
          expect.unreachable('parseConfig should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });

      it('should reject a non-boolean treat_super_specially', () => {
        expect(() => parseConfig('[builder]\ntreat_super_specially = "yes"\n')).toThrow(
          "Invalid type for 'builder.treat_super_specially': expected boolean, got string"
        );
      });

      it('should reject a flag list that is not an array', () => {
        expect(() => parseConfig('[builder]\ndefault_class_flags = "PUBLIC"\n')).toThrow(
          "Invalid type for 'builder.default_class_flags': expected array of strings, got string"
        );
      });

      it('should name the offending element of the flag list', () => {
        expect(() => parseConfig('[builder]\ndefault_class_flags = [1, 2]\n')).toThrow(
          "Invalid type for 'builder.default_class_flags[0]': expected string, got number"
        );
      });

      it('should reject an unsupported version', () => {
        expect(() => parseConfig('[builder]\ndefault_version = "RELEASE_99"\n')).toThrow(
          "Invalid value for 'builder.default_version': unsupported class-file version 'RELEASE_99'"
        );
      });

      it('should reject a version of the wrong type', () => {
        expect(() => parseConfig('[builder]\ndefault_version = true\n')).toThrow(
          "Invalid type for 'builder.default_version': expected version string or number, got boolean"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('logging = "verbose"\n')).toThrow(
          "Invalid type for 'logging': expected table, got string"
        );
      });

      it('should reject a non-string component', () => {
        expect(() => parseConfig('[logging]\ncomponent = 3\n')).toThrow(
          "Invalid type for 'logging.component': expected string, got number"
        );
      });
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy of the defaults', () => {
      const config = getDefaultConfig();
      expect(config).toEqual(DEFAULT_CONFIG);

      config.builder.default_class_flags.push('FINAL');
      expect(DEFAULT_CONFIG.builder.default_class_flags).toEqual(['PUBLIC']);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'classwright-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read and parse a config file', async () => {
      const path = join(dir, 'classwright.toml');
      await writeFile(path, '[builder]\ndefault_version = "RELEASE_9"\n', 'utf8');

      const config = await loadConfig(path, { env: {} });

      expect(config.builder.default_version).toBe('RELEASE_9');
    });

    it('should return defaults for a missing file', async () => {
      const config = await loadConfig(join(dir, 'missing.toml'), { env: {} });

      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should apply environment overrides over file values', async () => {
      const path = join(dir, 'classwright.toml');
      await writeFile(path, '[builder]\ndefault_version = "RELEASE_9"\n', 'utf8');

      const config = await loadConfig(path, { env: { CLASSWRIGHT_VERSION: '21' } });

      expect(config.builder.default_version).toBe('RELEASE_21');
    });

    it('should wrap read failures other than a missing file', async () => {
      await expect(loadConfig(dir, { env: {} })).rejects.toThrow(ConfigParseError);
    });
  });
});
