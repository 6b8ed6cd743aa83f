/**
 * Unit tests for shape
 * Tests structural selection of untagged payload variants
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { defineShapes, discriminate, shape, shapeSchema } from './shape.js';
import { StaticEnvelopeSchema } from './schemas/envelope.js';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from './logger.js';

type TestPayload =
  | { kind: 'daily'; daily: { fxDate: string }[] }
  | { kind: 'hourly'; hourly: { fxTime: string }[] }
  | { kind: 'poi'; poi: { name: string }[] };

const TestShapes = defineShapes<TestPayload>(
  shape('daily', ['daily'], z.object({ daily: z.array(z.object({ fxDate: z.string() })) })),
  shape('hourly', ['hourly'], z.object({ hourly: z.array(z.object({ fxTime: z.string() })) })),
  shape('poi', ['poi'], z.object({ poi: z.array(z.object({ name: z.string() })) }))
);

describe('discriminate', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should select the variant whose fields are present', () => {
    const outcome = discriminate(TestShapes, { daily: [{ fxDate: '2021-11-15' }] });

    expect(outcome).toEqual({
      success: true,
      data: { kind: 'daily', daily: [{ fxDate: '2021-11-15' }] },
    });
  });

  it('should select a later variant when earlier ones do not match', () => {
    const outcome = discriminate(TestShapes, { poi: [{ name: 'Summer Palace' }] });

    expect(outcome).toEqual({
      success: true,
      data: { kind: 'poi', poi: [{ name: 'Summer Palace' }] },
    });
  });

  it('should fail when no variant matches', () => {
    const outcome = discriminate(TestShapes, { location: [] });

    expect(outcome).toEqual({
      success: false,
      issues: ['no payload variant matched (expected one of: daily, hourly, poi)'],
    });
  });

  it('should treat a null field as absent', () => {
    const outcome = discriminate(TestShapes, { daily: null });

    expect(outcome.success).toBe(false);
  });

  it('should fail for a body that is not an object', () => {
    expect(discriminate(TestShapes, 'daily')).toEqual({
      success: false,
      issues: ['expected a JSON object'],
    });
  });

  it('should keep the first match and warn when several variants match', () => {
    const outcome = discriminate(TestShapes, {
      daily: [{ fxDate: '2021-11-15' }],
      hourly: [{ fxTime: '2021-11-15T10:00+08:00' }],
    });

    expect(outcome).toEqual({
      success: true,
      data: { kind: 'daily', daily: [{ fxDate: '2021-11-15' }] },
    });
    expect(logger.warn).toHaveBeenCalledWith('Payload matches more than one variant', {
      candidates: ['daily', 'hourly'],
      selected: 'daily',
    });
  });

  it('should prefix decode issues with the selected kind', () => {
    const outcome = discriminate(TestShapes, { daily: [{ fxDate: 5 }] });

    expect(outcome).toEqual({
      success: false,
      issues: ['daily: daily.0.fxDate: Expected string, received number'],
    });
  });
});

describe('defineShapes', () => {
  it('should reject variants whose required fields overlap as subsets', () => {
    expect(() =>
      defineShapes<object>(
        shape('hourly', ['hourly'], z.object({ hourly: z.array(z.unknown()) })),
        shape('hourlyWithSummary', ['hourly', 'summary'], z.object({ summary: z.string() }))
      )
    ).toThrow('Payload variants "hourly" and "hourlyWithSummary" are not structurally disjoint');
  });

  it('should reject a repeated kind', () => {
    expect(() =>
      defineShapes<object>(
        shape('list', ['a'], z.object({ a: z.string() })),
        shape('list', ['b'], z.object({ b: z.string() }))
      )
    ).toThrow('Payload variant "list" is declared twice');
  });

  it('should reject a variant without required fields', () => {
    expect(() => defineShapes<object>(shape('anything', [], z.object({ a: z.string() })))).toThrow(
      'Payload variant "anything" declares no required fields'
    );
  });

  it('should freeze the declared order', () => {
    expect(TestShapes.map((variant) => variant.kind)).toEqual(['daily', 'hourly', 'poi']);
    expect(Object.isFrozen(TestShapes)).toBe(true);
  });
});

describe('shapeSchema', () => {
  const ResponseSchema = StaticEnvelopeSchema.and(shapeSchema(TestShapes));

  it('should compose with an envelope schema', () => {
    const parsed = ResponseSchema.parse({
      code: '200',
      poi: [{ name: 'Summer Palace' }],
      refer: { sources: ['QWeather'], license: ['QWeather Developers License'] },
    });

    expect(parsed).toEqual({
      code: '200',
      refer: { sources: ['QWeather'], license: ['QWeather Developers License'] },
      kind: 'poi',
      poi: [{ name: 'Summer Palace' }],
    });
  });

  it('should surface discrimination failures as zod issues', () => {
    const result = ResponseSchema.safeParse({ code: '200', refer: { sources: [], license: [] } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'no payload variant matched (expected one of: daily, hourly, poi)',
      ]);
    }
  });
});
