/**
 * Common Zod schemas for endpoint inputs and payload fields
 */

import { z } from 'zod';

/**
 * Provider timestamps: minute precision with offset, e.g. `2020-06-30T22:00+08:00`
 * or `2023-05-17T02:00Z`; seconds are tolerated.
 */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export const TimestampSchema = z
  .string()
  .regex(TIMESTAMP_PATTERN, 'Expected a timestamp like 2020-06-30T22:00+08:00');

/**
 * Timestamp that may be absent or an empty string
 */
export const OptionalTimestampSchema = z
  .union([TimestampSchema, z.literal('')])
  .nullish()
  .transform((value) => (value === '' || value === null ? undefined : value));

export const DateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date like 2021-11-15');

/**
 * LocationID or "longitude,latitude" pair
 */
export const LocationSchema = z
  .string()
  .trim()
  .min(1, 'Location must not be empty')
  .describe('LocationID (e.g. 101010100) or "longitude,latitude" (e.g. 116.41,39.92)');

export const LatitudeSchema = z
  .number()
  .min(-90, 'Latitude must be >= -90')
  .max(90, 'Latitude must be <= 90')
  .describe('Latitude in decimal degrees');

export const LongitudeSchema = z
  .number()
  .min(-180, 'Longitude must be >= -180')
  .max(180, 'Longitude must be <= 180')
  .describe('Longitude in decimal degrees');

/**
 * ISO 3166 country or region code used to narrow searches
 */
export const RangeSchema = z
  .string()
  .trim()
  .min(2, 'Range must be an ISO 3166 code such as cn')
  .describe('ISO 3166 country or region code, e.g. cn');

export const ResultCountSchema = z
  .number()
  .int()
  .min(1, 'Number of results must be between 1 and 20')
  .max(20, 'Number of results must be between 1 and 20')
  .describe('Number of results to return (1-20, provider default 10)');

/**
 * Format a coordinate the way the provider expects: at most two decimals,
 * no trailing zeros
 */
export function formatCoordinate(value: number): string {
  return String(Number(value.toFixed(2)));
}

/**
 * RGBA colour used by the air-quality endpoints
 */
export const ColorSchema = z.object({
  red: z.number().int(),
  green: z.number().int(),
  blue: z.number().int(),
  alpha: z.number(),
});

export type Color = z.infer<typeof ColorSchema>;
