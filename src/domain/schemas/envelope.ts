/**
 * Response envelope schemas
 *
 * Payload fields sit at the same level as the envelope fields; endpoint
 * schemas extend one of these families with their payload.
 */

import { z } from 'zod';
import { OptionalTimestampSchema } from './common.js';

export const StatusCodeSchema = z
  .union([z.string(), z.number()])
  .transform((code) => String(code));

/**
 * Data sources and licence notices; either list may be empty or missing
 */
export const ReferSchema = z
  .object({
    sources: z.array(z.string()).default([]),
    license: z.array(z.string()).default([]),
  })
  .default({ sources: [], license: [] });

export type Refer = z.infer<typeof ReferSchema>;

/**
 * Weather, warning, indices, minutely and storm endpoints
 */
export const DynamicEnvelopeSchema = z.object({
  code: StatusCodeSchema,
  updateTime: OptionalTimestampSchema,
  fxLink: z
    .string()
    .nullish()
    .transform((value) => value || undefined),
  refer: ReferSchema,
});

export type DynamicEnvelope = z.infer<typeof DynamicEnvelopeSchema>;

/**
 * GeoAPI endpoints carry no update time and no page link
 */
export const StaticEnvelopeSchema = z.object({
  code: StatusCodeSchema,
  refer: ReferSchema,
});

export type StaticEnvelope = z.infer<typeof StaticEnvelopeSchema>;

/**
 * Air-quality v1 endpoints have no status code and describe sources in a
 * `metadata` object
 */
export const MetadataEnvelopeSchema = z.object({
  metadata: z.object({
    tag: z.string(),
    sources: z.array(z.string()).default([]),
  }),
});

export type MetadataEnvelope = z.infer<typeof MetadataEnvelopeSchema>;
