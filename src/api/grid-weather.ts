/**
 * Grid weather: numerical-model data at 3-5 km resolution for any coordinate
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema } from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import {
  GridDailyForecastSchema,
  GridHourlyForecastSchema,
  GridWeatherNowSchema,
} from './schemas.js';

export const GRID_DAILY_FORECAST_DAYS = [3, 7] as const;
export const GRID_HOURLY_FORECAST_HOURS = [24, 72] as const;

export const GridWeatherNowInputSchema = z.object({
  location: LocationSchema,
});

export type GridWeatherNowInput = z.input<typeof GridWeatherNowInputSchema>;

export const GridWeatherDailyInputSchema = z.object({
  location: LocationSchema,
  days: z
    .number()
    .refine(
      (days) => GRID_DAILY_FORECAST_DAYS.some((allowed) => allowed === days),
      `Days must be one of ${GRID_DAILY_FORECAST_DAYS.join(', ')}`
    ),
});

export type GridWeatherDailyInput = z.input<typeof GridWeatherDailyInputSchema>;

export const GridWeatherHourlyInputSchema = z.object({
  location: LocationSchema,
  hours: z
    .number()
    .refine(
      (hours) => GRID_HOURLY_FORECAST_HOURS.some((allowed) => allowed === hours),
      `Hours must be one of ${GRID_HOURLY_FORECAST_HOURS.join(', ')}`
    ),
});

export type GridWeatherHourlyInput = z.input<typeof GridWeatherHourlyInputSchema>;

export const GridWeatherNowResponseSchema = DynamicEnvelopeSchema.extend({
  now: GridWeatherNowSchema,
});

export type GridWeatherNowResponse = z.infer<typeof GridWeatherNowResponseSchema>;

export const GridWeatherDailyResponseSchema = DynamicEnvelopeSchema.extend({
  daily: z.array(GridDailyForecastSchema),
});

export type GridWeatherDailyResponse = z.infer<typeof GridWeatherDailyResponseSchema>;

export const GridWeatherHourlyResponseSchema = DynamicEnvelopeSchema.extend({
  hourly: z.array(GridHourlyForecastSchema),
});

export type GridWeatherHourlyResponse = z.infer<typeof GridWeatherHourlyResponseSchema>;

export async function gridWeatherNow(
  client: QWeatherClient,
  input: GridWeatherNowInput,
  options?: RequestOptions
): Promise<ApiResult<GridWeatherNowResponse>> {
  const args = validateInput(GridWeatherNowInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/grid-weather/now`,
    { location: args.data.location },
    GridWeatherNowResponseSchema,
    options
  );
}

export async function gridWeatherDailyForecast(
  client: QWeatherClient,
  input: GridWeatherDailyInput,
  options?: RequestOptions
): Promise<ApiResult<GridWeatherDailyResponse>> {
  const args = validateInput(GridWeatherDailyInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/grid-weather/${args.data.days}d`,
    { location: args.data.location },
    GridWeatherDailyResponseSchema,
    options
  );
}

export async function gridWeatherHourlyForecast(
  client: QWeatherClient,
  input: GridWeatherHourlyInput,
  options?: RequestOptions
): Promise<ApiResult<GridWeatherHourlyResponse>> {
  const args = validateInput(GridWeatherHourlyInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/grid-weather/${args.data.hours}h`,
    { location: args.data.location },
    GridWeatherHourlyResponseSchema,
    options
  );
}
