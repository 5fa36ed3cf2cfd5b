import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];

  beforeEach(() => {
    capturedOutput = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    const parsed: unknown = JSON.parse(getOutput(index).trim());
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Expected a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  describe('safe serialization', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('TestLogger');
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(String(parsed.serializationError).length).toBeGreaterThan(0);
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should handle long values carried as bigint', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.info('bigint_test', { value: 9007199254740993n });

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.event).toBe('bigint_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should output a single JSON line even when serialization fails', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      logger.error('error_with_circular', circularObj);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
    });

    it('should include timestamp, level, component and event in the fallback entry', () => {
      const logger = new Logger({ component: 'FallbackTest' });

      const circularObj: Record<string, unknown> = {};
      circularObj.ref = circularObj;

      logger.warn('fallback_fields', circularObj);

      const parsed = parseOutput(0);

      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('warn');
      expect(parsed.component).toBe('FallbackTest');
      expect(parsed.event).toBe('fallback_fields');
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.anything({ withBigInt: true }), (payload) => {
          capturedOutput = [];

          logger.info('fuzz_test', { payload });

          expect(capturedOutput.length).toBe(1);
          const parsed = parseOutput(0);
          expect(parsed.level).toBe('info');
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz_test');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages correctly', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.info('test_event', { key: 'value' });

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.event).toBe('test_event');
      expect(parsed.data).toEqual({ key: 'value' });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.info('bare_event');

      expect(Object.keys(parseOutput(0)).sort()).toEqual([
        'component',
        'event',
        'level',
        'timestamp',
      ]);
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: false });

      logger.debug('debug_event', { key: 'value' });

      expect(capturedOutput.length).toBe(0);
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'TestLogger', debugMode: true });

      logger.debug('debug_event', { key: 'value' });

      expect(capturedOutput.length).toBe(1);
      expect(parseOutput(0).level).toBe('debug');
      expect(logger.isDebugEnabled).toBe(true);
    });

    it('should log warn messages correctly', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.warn('warning_event', { reason: 'test' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.event).toBe('warning_event');
      expect(parsed.data).toEqual({ reason: 'test' });
    });

    it('should log error messages correctly', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.error('error_event', { code: 500 });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('error');
      expect(parsed.event).toBe('error_event');
      expect(parsed.data).toEqual({ code: 500 });
    });
  });
});
