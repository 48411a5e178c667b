import {
  isRecord,
  validateArray,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateString,
  validateTimestamp
} from '../../src/util/validation';

describe('validation utilities', () => {
  describe('validateNumber', () => {
    it('accepts valid numbers and enforces min/max/integer', () => {
      expect(validateNumber(5, 'test')).toBe(5);
      expect(validateNumber(10, 'test', { min: 5 })).toBe(10);
      expect(() => validateNumber(4, 'test', { min: 5 })).toThrow('Invalid test: must be at least 5');
      expect(() => validateNumber(11, 'test', { max: 10 })).toThrow('Invalid test: must be at most 10');
      expect(validateNumber(3, 'test', { integer: true })).toBe(3);
      expect(() => validateNumber(3.5, 'test', { integer: true })).toThrow('Invalid test: must be an integer');
    });

    it('throws for non-numbers and NaN', () => {
      expect(() => validateNumber('a', 'test')).toThrow('Invalid test: must be a number');
      expect(() => validateNumber(NaN, 'test')).toThrow('Invalid test: must be a number');
    });
  });

  describe('validateBoolean', () => {
    it('accepts booleans and rejects others', () => {
      expect(validateBoolean(true, 'flag')).toBe(true);
      expect(() => validateBoolean('true', 'flag')).toThrow('Invalid flag: must be a boolean');
    });
  });

  describe('validateString', () => {
    it('validates length and pattern', () => {
      expect(validateString('hello', 's')).toBe('hello');
      expect(() => validateString(123, 's')).toThrow();
      expect(() => validateString('a', 's', { minLength: 2 })).toThrow();
      expect(() => validateString('long', 's', { maxLength: 3 })).toThrow();
      expect(() => validateString('abc', 's', { pattern: /\d+/ })).toThrow('Invalid s: does not match required pattern');
    });
  });

  describe('validateArray', () => {
    it('validates array size and elements', () => {
      expect(validateArray([1, 2, 3], 'arr')).toEqual([1, 2, 3]);
      expect(() => validateArray('notarray', 'arr')).toThrow('Invalid arr: must be an array');
      expect(() => validateArray([], 'arr', { minLength: 1 })).toThrow();
      expect(() => validateArray([1, 2, 3, 4], 'arr', { maxLength: 3 })).toThrow();
      expect(() => validateArray([1, 'x'], 'arr', { elementValidator: (el) => typeof el === 'number' }))
        .toThrow('Invalid arr: element at index 1 failed validation');
    });
  });

  describe('validateEnum', () => {
    it('returns the matching literal', () => {
      expect(validateEnum('comfort', 'mode', ['economy', 'comfort'] as const)).toBe('comfort');
    });

    it('lists the allowed values when nothing matches', () => {
      expect(() => validateEnum('eco', 'mode', ['economy', 'comfort'] as const))
        .toThrow('Invalid mode: must be one of economy, comfort');
    });
  });

  describe('validateTimestamp', () => {
    it('accepts ISO timestamps', () => {
      expect(validateTimestamp('2024-03-01T12:00:00Z', 'start')).toBe('2024-03-01T12:00:00Z');
    });

    it('rejects unparseable text', () => {
      expect(() => validateTimestamp('tomorrow', 'start')).toThrow('Invalid start: must be an ISO 8601 timestamp');
    });
  });

  describe('isRecord', () => {
    it('accepts plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });
});
