/**
 * Life indices (sport, car wash, UV, dressing, ...)
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema } from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import { DailyIndexSchema } from './schemas.js';

export const INDICES_FORECAST_DAYS = [1, 3] as const;

export const IndicesInputSchema = z.object({
  location: LocationSchema,
  /** Index type ids; 0 requests all of them */
  type: z
    .array(z.number().int().min(0, 'Index type must be a non-negative integer'))
    .min(1, 'At least one index type is required'),
  days: z
    .number()
    .refine(
      (days) => INDICES_FORECAST_DAYS.some((allowed) => allowed === days),
      `Days must be one of ${INDICES_FORECAST_DAYS.join(', ')}`
    ),
});

export type IndicesInput = z.input<typeof IndicesInputSchema>;

export const IndicesResponseSchema = DynamicEnvelopeSchema.extend({
  daily: z.array(DailyIndexSchema),
});

export type IndicesResponse = z.infer<typeof IndicesResponseSchema>;

export async function indicesForecast(
  client: QWeatherClient,
  input: IndicesInput,
  options?: RequestOptions
): Promise<ApiResult<IndicesResponse>> {
  const args = validateInput(IndicesInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/indices/${args.data.days}d`,
    { location: args.data.location, type: args.data.type.join(',') },
    IndicesResponseSchema,
    options
  );
}
