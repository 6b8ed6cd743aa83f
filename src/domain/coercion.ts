/**
 * Tolerant scalar decoding
 *
 * The provider sends numeric and boolean fields as JSON numbers, as strings
 * holding a number, as empty strings or as null, depending on endpoint and
 * field. Every payload schema decodes such fields through the factories here.
 */

import { z } from 'zod';

/**
 * Result of coercing one JSON value. `value: null` means "no value"
 * (null, absent or empty string).
 */
export type Coerced<T> =
  | { ok: true; value: T | null }
  | { ok: false; reason: string };

export type Coercer<T> = (value: unknown) => Coerced<T>;

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

function show(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

export function coerceNumber(value: unknown): Coerced<number> {
  if (isEmpty(value)) {
    return { ok: true, value: null };
  }
  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? { ok: true, value }
      : { ok: false, reason: `expected a finite number, received ${show(value)}` };
  }
  if (typeof value === 'string' && DECIMAL_LITERAL.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed)
      ? { ok: true, value: parsed }
      : { ok: false, reason: `expected a finite number, received ${show(value)}` };
  }
  return { ok: false, reason: `expected a number, received ${show(value)}` };
}

export function coerceInteger(value: unknown): Coerced<number> {
  if (isEmpty(value)) {
    return { ok: true, value: null };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value)
      ? { ok: true, value }
      : { ok: false, reason: `expected an integer, received ${show(value)}` };
  }
  if (typeof value === 'string' && INTEGER_LITERAL.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed)
      ? { ok: true, value: parsed }
      : { ok: false, reason: `integer out of range, received ${show(value)}` };
  }
  return { ok: false, reason: `expected an integer, received ${show(value)}` };
}

/**
 * Accepts native booleans, 0/1 and the strings "0", "1", "true", "false"
 */
export function coerceBoolean(value: unknown): Coerced<boolean> {
  if (isEmpty(value)) {
    return { ok: true, value: null };
  }
  if (typeof value === 'boolean') {
    return { ok: true, value };
  }
  if (value === 0 || value === 1) {
    return { ok: true, value: value === 1 };
  }
  if (typeof value === 'string') {
    switch (value.toLowerCase()) {
      case '1':
      case 'true':
        return { ok: true, value: true };
      case '0':
      case 'false':
        return { ok: true, value: false };
    }
  }
  return { ok: false, reason: `expected a boolean, received ${show(value)}` };
}

/**
 * Build a zod schema for a required field from a coercer
 */
export function requiredField<T>(coerce: Coercer<T>): z.ZodType<T, z.ZodTypeDef, unknown> {
  return z.unknown().transform((value, ctx): T => {
    const result = coerce(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.reason });
      return z.NEVER;
    }
    if (result.value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Required' });
      return z.NEVER;
    }
    return result.value;
  });
}

/**
 * Build a zod schema for an optional field from a coercer
 */
export function optionalField<T>(
  coerce: Coercer<T>
): z.ZodType<T | undefined, z.ZodTypeDef, unknown> {
  return z.unknown().transform((value, ctx): T | undefined => {
    const result = coerce(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.reason });
      return z.NEVER;
    }
    return result.value ?? undefined;
  });
}

export const numberField = () => requiredField(coerceNumber);
export const optionalNumberField = () => optionalField(coerceNumber);
export const integerField = () => requiredField(coerceInteger);
export const optionalIntegerField = () => optionalField(coerceInteger);
export const booleanField = () => requiredField(coerceBoolean);
export const optionalBooleanField = () => optionalField(coerceBoolean);

/**
 * String field that may be absent, null or empty; all three decode to undefined
 */
export const optionalStringField = () =>
  z
    .string()
    .nullish()
    .transform((value) => (value === null || value === '' ? undefined : value));
