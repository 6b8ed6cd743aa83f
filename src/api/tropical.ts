/**
 * Tropical cyclone track forecast
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import type { ApiResult } from '../domain/types.js';
import { StormForecastSchema } from './schemas.js';

export const StormForecastInputSchema = z.object({
  stormId: z.string().trim().min(1, 'Storm id must not be empty'),
});

export type StormForecastInput = z.input<typeof StormForecastInputSchema>;

export const StormForecastResponseSchema = DynamicEnvelopeSchema.extend({
  forecast: z.array(StormForecastSchema),
});

export type StormForecastResponse = z.infer<typeof StormForecastResponseSchema>;

export async function stormForecast(
  client: QWeatherClient,
  input: StormForecastInput,
  options?: RequestOptions
): Promise<ApiResult<StormForecastResponse>> {
  const args = validateInput(StormForecastInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/tropical/storm-forecast`,
    { stormid: args.data.stormId },
    StormForecastResponseSchema,
    options
  );
}
