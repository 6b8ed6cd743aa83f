/**
 * Structural selection of untagged payload variants
 *
 * Some endpoints answer with one of several record shapes and no field that
 * says which. Each shape is declared with the field names that identify it;
 * the body is matched against the shapes in declared order and the first
 * match is decoded and tagged with its `kind`. The declared order is part of
 * the contract of each variant set.
 */

import { z } from 'zod';
import { formatIssues } from './error-handler.js';
import { isRecord } from './envelope.js';
import { logger } from './logger.js';

/**
 * One variant of a payload variant set
 */
export interface ShapeVariant<T> {
  readonly kind: string;
  /** Fields that must all be present (not absent, not null) for a match */
  readonly requires: readonly string[];
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Output type of a variant
 */
export type ShapeOf<V> = V extends ShapeVariant<infer T> ? T : never;

export type DecodeOutcome<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

/**
 * Declare a variant. The decoded value is tagged with `kind`.
 */
export function shape<K extends string, T extends object>(
  kind: K,
  requires: readonly string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ShapeVariant<{ kind: K } & T> {
  return {
    kind,
    requires,
    schema: schema.transform((value) => ({ kind, ...value })),
  };
}

function isSubset(a: readonly string[], b: readonly string[]): boolean {
  return a.every((field) => b.includes(field));
}

/**
 * Fix the order of a variant set and check that no two variants can claim
 * the same body.
 *
 * @throws Error when a variant has no required fields, when kinds repeat, or
 *   when one variant's required fields are a subset of another's
 */
export function defineShapes<T>(
  ...variants: ShapeVariant<T>[]
): readonly ShapeVariant<T>[] {
  variants.forEach((variant, i) => {
    if (variant.requires.length === 0) {
      throw new Error(`Payload variant "${variant.kind}" declares no required fields`);
    }

    variants.slice(i + 1).forEach((other) => {
      if (other.kind === variant.kind) {
        throw new Error(`Payload variant "${variant.kind}" is declared twice`);
      }
      if (isSubset(variant.requires, other.requires) || isSubset(other.requires, variant.requires)) {
        throw new Error(
          `Payload variants "${variant.kind}" and "${other.kind}" are not structurally disjoint`
        );
      }
    });
  });

  return Object.freeze([...variants]);
}

function matches(body: Record<string, unknown>, variant: ShapeVariant<unknown>): boolean {
  return variant.requires.every((field) => body[field] !== undefined && body[field] !== null);
}

/**
 * Select and decode the variant a body belongs to
 */
export function discriminate<T>(
  variants: readonly ShapeVariant<T>[],
  body: unknown
): DecodeOutcome<T> {
  if (!isRecord(body)) {
    return { success: false, issues: ['expected a JSON object'] };
  }

  const candidates = variants.filter((variant) => matches(body, variant));
  const [selected] = candidates;

  if (!selected) {
    const expected = variants.map((variant) => variant.kind).join(', ');
    return {
      success: false,
      issues: [`no payload variant matched (expected one of: ${expected})`],
    };
  }

  if (candidates.length > 1) {
    logger.warn('Payload matches more than one variant', {
      candidates: candidates.map((variant) => variant.kind),
      selected: selected.kind,
    });
  }

  const parsed = selected.schema.safeParse(body);
  if (!parsed.success) {
    return {
      success: false,
      issues: formatIssues(parsed.error.issues).map((issue) => `${selected.kind}: ${issue}`),
    };
  }

  return { success: true, data: parsed.data };
}

/**
 * A variant set as a zod schema, so it composes with an envelope schema
 * through `.and()`
 */
export function shapeSchema<T>(
  variants: readonly ShapeVariant<T>[]
): z.ZodType<T, z.ZodTypeDef, unknown> {
  return z.unknown().transform((body, ctx): T => {
    const outcome = discriminate(variants, body);
    if (!outcome.success) {
      for (const message of outcome.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
      return z.NEVER;
    }
    return outcome.data;
  });
}
