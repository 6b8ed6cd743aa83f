/**
 * Official weather warnings
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema, RangeSchema } from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import { WarningLocationSchema, WarningSchema } from './schemas.js';

export const WeatherWarningInputSchema = z.object({
  location: LocationSchema,
});

export type WeatherWarningInput = z.input<typeof WeatherWarningInputSchema>;

export const WarningCityListInputSchema = z.object({
  range: RangeSchema,
});

export type WarningCityListInput = z.input<typeof WarningCityListInputSchema>;

export const WeatherWarningResponseSchema = DynamicEnvelopeSchema.extend({
  warning: z.array(WarningSchema),
});

export type WeatherWarningResponse = z.infer<typeof WeatherWarningResponseSchema>;

/** The city list carries no page link */
export const WarningCityListResponseSchema = DynamicEnvelopeSchema.omit({ fxLink: true }).extend({
  warningLocList: z.array(WarningLocationSchema),
});

export type WarningCityListResponse = z.infer<typeof WarningCityListResponseSchema>;

/**
 * Warnings currently in force at a location. An empty `warning` list means
 * none.
 */
export async function weatherWarning(
  client: QWeatherClient,
  input: WeatherWarningInput,
  options?: RequestOptions
): Promise<ApiResult<WeatherWarningResponse>> {
  const args = validateInput(WeatherWarningInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/warning/now`,
    { location: args.data.location },
    WeatherWarningResponseSchema,
    options
  );
}

/**
 * LocationIDs of all cities in a country or region with a warning in force
 */
export async function weatherWarningCityList(
  client: QWeatherClient,
  input: WarningCityListInput,
  options?: RequestOptions
): Promise<ApiResult<WarningCityListResponse>> {
  const args = validateInput(WarningCityListInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/warning/list`,
    { range: args.data.range },
    WarningCityListResponseSchema,
    options
  );
}
