/**
 * Unit tests for guard utilities
 */

import { describe, it, expect } from '@jest/globals';
import {
  isRecord,
  ensureRecord,
  ensureArray,
  ensureString,
  isNonEmptyString,
  parsePositiveInt,
  parseThreshold,
} from '../src/lib/guards';

describe('Guard Utilities', () => {
  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });

  describe('ensureRecord', () => {
    it('should return object when valid', () => {
      const obj = { foo: 'bar' };
      expect(ensureRecord(obj, 'test')).toBe(obj);
    });

    it('should throw on null', () => {
      expect(() => ensureRecord(null, 'test')).toThrow('Expected object for test, got null/undefined');
    });

    it('should throw on arrays and primitives', () => {
      expect(() => ensureRecord([1], 'test')).toThrow('Expected object for test, got array');
      expect(() => ensureRecord(123, 'test')).toThrow('Expected object for test, got number');
    });
  });

  describe('ensureArray', () => {
    it('should return array when valid', () => {
      const arr = [1, 2, 3];
      expect(ensureArray(arr, 'test')).toBe(arr);
    });

    it('should throw on undefined', () => {
      expect(() => ensureArray(undefined, 'test')).toThrow('Expected array for test, got null/undefined');
    });

    it('should throw on non-array', () => {
      expect(() => ensureArray({ foo: 'bar' }, 'test')).toThrow('Expected array for test, got object');
    });
  });

  describe('ensureString', () => {
    it('should return string when valid', () => {
      expect(ensureString('', 'field')).toBe('');
    });

    it('should throw on non-string', () => {
      expect(() => ensureString(123, 'test')).toThrow('Expected string for test, got number');
    });
  });

  describe('isNonEmptyString', () => {
    it('should reject blank strings', () => {
      expect(isNonEmptyString('abc')).toBe(true);
      expect(isNonEmptyString('   ')).toBe(false);
      expect(isNonEmptyString(5)).toBe(false);
    });
  });

  describe('parsePositiveInt', () => {
    it('should fall back when unset or blank', () => {
      expect(parsePositiveInt(undefined, 'SAMPLE_RATE', 32000)).toBe(32000);
      expect(parsePositiveInt(' ', 'SAMPLE_RATE', 32000)).toBe(32000);
    });

    it('should parse integers', () => {
      expect(parsePositiveInt('16000', 'SAMPLE_RATE', 32000)).toBe(16000);
    });

    it('should reject zero, negatives and fractions', () => {
      expect(() => parsePositiveInt('0', '--precision', 100)).toThrow(
        'Expected positive integer for --precision, got "0"',
      );
      expect(() => parsePositiveInt('-3', '--precision', 100)).toThrow();
      expect(() => parsePositiveInt('2.5', '--precision', 100)).toThrow();
    });
  });

  describe('parseThreshold', () => {
    it('should accept the 0-100 range', () => {
      expect(parseThreshold('0', 20)).toBe(0);
      expect(parseThreshold('72.5', 20)).toBe(72.5);
      expect(parseThreshold(undefined, 20)).toBe(20);
    });

    it('should reject out of range values', () => {
      expect(() => parseThreshold('101', 20)).toThrow('Expected threshold between 0 and 100, got "101"');
      expect(() => parseThreshold('abc', 20)).toThrow();
    });
  });
});
