/**
 * Unit tests for coercion
 * Tests tolerant decoding of numeric and boolean fields
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  coerceBoolean,
  coerceInteger,
  coerceNumber,
  booleanField,
  integerField,
  numberField,
  optionalBooleanField,
  optionalNumberField,
  optionalStringField,
} from './coercion.js';

describe('coerceNumber', () => {
  it('should decode "37", 37 and 37.0 to the same value', () => {
    expect(coerceNumber('37')).toEqual({ ok: true, value: 37 });
    expect(coerceNumber(37)).toEqual({ ok: true, value: 37 });
    expect(coerceNumber(37.0)).toEqual({ ok: true, value: 37 });
    expect(coerceNumber('37.0')).toEqual({ ok: true, value: 37 });
  });

  it('should accept signed, fractional and exponent literals', () => {
    expect(coerceNumber('-1')).toEqual({ ok: true, value: -1 });
    expect(coerceNumber('0.0')).toEqual({ ok: true, value: 0 });
    expect(coerceNumber('.5')).toEqual({ ok: true, value: 0.5 });
    expect(coerceNumber('1e3')).toEqual({ ok: true, value: 1000 });
  });

  it('should treat null, undefined and empty string as no value', () => {
    expect(coerceNumber(null)).toEqual({ ok: true, value: null });
    expect(coerceNumber(undefined)).toEqual({ ok: true, value: null });
    expect(coerceNumber('')).toEqual({ ok: true, value: null });
  });

  it('should reject strings that are not numbers', () => {
    expect(coerceNumber('abc')).toEqual({
      ok: false,
      reason: 'expected a number, received "abc"',
    });
    expect(coerceNumber(' 37')).toEqual({
      ok: false,
      reason: 'expected a number, received " 37"',
    });
    expect(coerceNumber('NaN')).toEqual({
      ok: false,
      reason: 'expected a number, received "NaN"',
    });
  });

  it('should reject non-finite numbers and other types', () => {
    expect(coerceNumber(Infinity)).toEqual({
      ok: false,
      reason: 'expected a finite number, received Infinity',
    });
    expect(coerceNumber('1e400')).toEqual({
      ok: false,
      reason: 'expected a finite number, received "1e400"',
    });
    expect(coerceNumber(true)).toEqual({
      ok: false,
      reason: 'expected a number, received true',
    });
  });
});

describe('coerceInteger', () => {
  it('should decode integer strings and numbers', () => {
    expect(coerceInteger('12')).toEqual({ ok: true, value: 12 });
    expect(coerceInteger('-3')).toEqual({ ok: true, value: -3 });
    expect(coerceInteger(7)).toEqual({ ok: true, value: 7 });
  });

  it('should reject fractional values', () => {
    expect(coerceInteger(1.5)).toEqual({
      ok: false,
      reason: 'expected an integer, received 1.5',
    });
    expect(coerceInteger('1.5')).toEqual({
      ok: false,
      reason: 'expected an integer, received "1.5"',
    });
  });

  it('should reject integer strings beyond the safe range', () => {
    expect(coerceInteger('123456789012345678901')).toEqual({
      ok: false,
      reason: 'integer out of range, received "123456789012345678901"',
    });
  });
});

describe('coerceBoolean', () => {
  it('should normalize every accepted spelling', () => {
    expect(coerceBoolean(true)).toEqual({ ok: true, value: true });
    expect(coerceBoolean(false)).toEqual({ ok: true, value: false });
    expect(coerceBoolean(1)).toEqual({ ok: true, value: true });
    expect(coerceBoolean(0)).toEqual({ ok: true, value: false });
    expect(coerceBoolean('1')).toEqual({ ok: true, value: true });
    expect(coerceBoolean('0')).toEqual({ ok: true, value: false });
    expect(coerceBoolean('true')).toEqual({ ok: true, value: true });
    expect(coerceBoolean('FALSE')).toEqual({ ok: true, value: false });
  });

  it('should reject other values', () => {
    expect(coerceBoolean('yes')).toEqual({
      ok: false,
      reason: 'expected a boolean, received "yes"',
    });
    expect(coerceBoolean(2)).toEqual({
      ok: false,
      reason: 'expected a boolean, received 2',
    });
  });
});

describe('field schemas', () => {
  const SampleSchema = z.object({
    temp: numberField(),
    cloud: optionalNumberField(),
    rank: integerField(),
    isDst: booleanField(),
    daylight: optionalBooleanField(),
    sunrise: optionalStringField(),
  });

  it('should decode a record with string-typed scalars', () => {
    const parsed = SampleSchema.parse({
      temp: '24',
      cloud: '10',
      rank: '35',
      isDst: '0',
      daylight: 'true',
      sunrise: '05:30',
    });

    expect(parsed).toEqual({
      temp: 24,
      cloud: 10,
      rank: 35,
      isDst: false,
      daylight: true,
      sunrise: '05:30',
    });
  });

  it('should map empty optional fields to undefined', () => {
    const parsed = SampleSchema.parse({
      temp: 24,
      cloud: '',
      rank: 35,
      isDst: 1,
      daylight: null,
      sunrise: '',
    });

    expect(parsed.cloud).toBeUndefined();
    expect(parsed.daylight).toBeUndefined();
    expect(parsed.sunrise).toBeUndefined();
  });

  it('should reject an empty string for a required field', () => {
    const result = SampleSchema.safeParse({ temp: '', rank: 1, isDst: true });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatchObject({ path: ['temp'], message: 'Required' });
    }
  });

  it('should reject null and absent required fields', () => {
    const result = SampleSchema.safeParse({ temp: null, isDst: true });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual(['temp', 'rank']);
    }
  });

  it('should report the coercion reason for unparsable values', () => {
    const result = SampleSchema.safeParse({ temp: 'warm', rank: 1, isDst: true });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('expected a number, received "warm"');
    }
  });
});
