/**
 * Minute-level precipitation for the next two hours (China only)
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema } from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import { MinutelySchema } from './schemas.js';

export const MinutelyInputSchema = z.object({
  location: LocationSchema.describe('"longitude,latitude" pair, e.g. 116.41,39.92'),
});

export type MinutelyInput = z.input<typeof MinutelyInputSchema>;

export const MinutelyResponseSchema = DynamicEnvelopeSchema.extend({
  summary: z.string(),
  minutely: z.array(MinutelySchema),
});

export type MinutelyResponse = z.infer<typeof MinutelyResponseSchema>;

/**
 * Precipitation in 5-minute steps for the next two hours
 */
export async function minutelyPrecipitation(
  client: QWeatherClient,
  input: MinutelyInput,
  options?: RequestOptions
): Promise<ApiResult<MinutelyResponse>> {
  const args = validateInput(MinutelyInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/minutely/5m`,
    { location: args.data.location },
    MinutelyResponseSchema,
    options
  );
}
