// Tests for built-in validators

import { describe, it, expect } from 'vitest';
import type { ValidatorSpec } from '@lumen-state/protocol';
import { runCustomCheck, runValidator } from './validators.js';

describe('runValidator', () => {
  describe('format', () => {
    it('passes matching strings', () => {
      expect(runValidator({ kind: 'format', pattern: /@/ }, 'a@b')).toBeNull();
    });

    it('fails non-matching strings and non-strings', () => {
      expect(runValidator({ kind: 'format', pattern: /@/ }, 'ab')).toEqual({
        kind: 'format',
        message: 'must match pattern /@/',
      });
      expect(runValidator({ kind: 'format', pattern: /@/ }, 42)).toEqual({
        kind: 'format',
        message: 'format validation requires a string, got 42',
      });
    });

    it('gives the same answer on repeated calls with a global pattern', () => {
      const spec: ValidatorSpec = { kind: 'format', pattern: /a/g };

      expect(runValidator(spec, 'a')).toBeNull();
      expect(runValidator(spec, 'a')).toBeNull();
    });
  });

  describe('length', () => {
    it('checks exact, minimum and maximum lengths', () => {
      expect(runValidator({ kind: 'length', is: 3 }, 'abc')).toBeNull();
      expect(runValidator({ kind: 'length', is: 3 }, 'abcd')).toEqual({
        kind: 'length',
        message: 'must be exactly 3 characters/items',
      });
      expect(runValidator({ kind: 'length', min: 2 }, 'a')).toEqual({
        kind: 'length',
        message: 'must be at least 2 characters/items',
      });
      expect(runValidator({ kind: 'length', max: 2 }, [1, 2, 3])).toEqual({
        kind: 'length',
        message: 'must be at most 2 characters/items',
      });
      expect(runValidator({ kind: 'length', min: 1, max: 3 }, [1, 2])).toBeNull();
    });

    it('fails values without a length', () => {
      expect(runValidator({ kind: 'length', min: 1 }, 5)).toEqual({
        kind: 'length',
        message: 'length validation requires string or list, got 5',
      });
    });
  });

  describe('inclusion and exclusion', () => {
    it('checks membership', () => {
      expect(runValidator({ kind: 'inclusion', values: ['a', 'b'] }, 'a')).toBeNull();
      expect(runValidator({ kind: 'inclusion', values: ['a', 'b'] }, 'c')).toEqual({
        kind: 'inclusion',
        message: 'must be one of ["a", "b"]',
      });
      expect(runValidator({ kind: 'exclusion', values: ['admin'] }, 'guest')).toBeNull();
      expect(runValidator({ kind: 'exclusion', values: ['admin'] }, 'admin')).toEqual({
        kind: 'exclusion',
        message: 'must not be one of ["admin"]',
      });
    });
  });

  describe('number', () => {
    it('uses strict bounds for greater/less than', () => {
      expect(runValidator({ kind: 'number', greaterThan: 0 }, 0)).toEqual({
        kind: 'number',
        message: 'must be greater than 0',
      });
      expect(runValidator({ kind: 'number', lessThan: 10 }, 10)).toEqual({
        kind: 'number',
        message: 'must be less than 10',
      });
    });

    it('uses inclusive bounds for the or-equal variants', () => {
      expect(runValidator({ kind: 'number', greaterThanOrEqualTo: 1 }, 1)).toBeNull();
      expect(runValidator({ kind: 'number', greaterThanOrEqualTo: 1 }, 0)).toEqual({
        kind: 'number',
        message: 'must be greater than or equal to 1',
      });
      expect(runValidator({ kind: 'number', lessThanOrEqualTo: 10 }, 10)).toBeNull();
      expect(runValidator({ kind: 'number', lessThanOrEqualTo: 10 }, 11)).toEqual({
        kind: 'number',
        message: 'must be less than or equal to 10',
      });
    });

    it('reports equal_to first', () => {
      expect(runValidator({ kind: 'number', equalTo: 5, greaterThan: 10 }, 4)).toEqual({
        kind: 'number',
        message: 'must be equal to 5',
      });
    });

    it('fails non-numbers', () => {
      expect(runValidator({ kind: 'number', greaterThan: 0 }, '5')).toEqual({
        kind: 'number',
        message: 'number validation requires a number, got "5"',
      });
    });
  });

  describe('custom', () => {
    it('interprets boolean and result-object returns', () => {
      expect(runValidator({ kind: 'custom', check: () => true }, 1)).toBeNull();
      expect(runValidator({ kind: 'custom', check: () => ({ ok: true }) }, 1)).toBeNull();
      expect(runValidator({ kind: 'custom', check: () => false }, 1)).toEqual({
        kind: 'custom',
        message: 'validation failed',
      });
      expect(runValidator({ kind: 'custom', check: () => ({ ok: false, message: 'too short' }) }, 1)).toEqual({
        kind: 'custom',
        message: 'too short',
      });
    });
  });

  it('fails an unrecognised validator kind instead of throwing', () => {
    // Definitions loaded from untyped sources can carry any kind
    const spec: ValidatorSpec = JSON.parse('{"kind":"uuid"}');

    expect(runValidator(spec, 'x')).toEqual({ kind: 'uuid', message: 'unknown validator: uuid' });
  });
});

describe('runCustomCheck', () => {
  it('passes the value to the check', () => {
    expect(runCustomCheck((value) => value === 'ok', 'ok')).toBeNull();
    expect(runCustomCheck((value) => value === 'ok', 'no')).toEqual({ kind: 'custom', message: 'validation failed' });
  });
});
