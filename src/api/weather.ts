/**
 * City weather: real-time conditions, daily and hourly forecasts
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { DynamicEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema } from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import { DynamicResponseSchema, type DynamicResponse } from './payloads.js';
import { DailyForecastSchema, WeatherNowSchema } from './schemas.js';

/** Forecast lengths offered by the daily forecast endpoint */
export const DAILY_FORECAST_DAYS = [3, 7, 10, 15, 30] as const;
/** Forecast lengths offered by the hourly forecast endpoint */
export const HOURLY_FORECAST_HOURS = [24, 72, 168] as const;

export const WeatherNowInputSchema = z.object({
  location: LocationSchema,
});

export type WeatherNowInput = z.input<typeof WeatherNowInputSchema>;

export const WeatherDailyInputSchema = z.object({
  location: LocationSchema,
  days: z
    .number()
    .refine(
      (days) => DAILY_FORECAST_DAYS.some((allowed) => allowed === days),
      `Days must be one of ${DAILY_FORECAST_DAYS.join(', ')}`
    ),
});

export type WeatherDailyInput = z.input<typeof WeatherDailyInputSchema>;

export const WeatherHourlyInputSchema = z.object({
  location: LocationSchema,
  hours: z
    .number()
    .refine(
      (hours) => HOURLY_FORECAST_HOURS.some((allowed) => allowed === hours),
      `Hours must be one of ${HOURLY_FORECAST_HOURS.join(', ')}`
    ),
});

export type WeatherHourlyInput = z.input<typeof WeatherHourlyInputSchema>;

export const WeatherNowResponseSchema = DynamicEnvelopeSchema.extend({
  now: WeatherNowSchema,
});

export type WeatherNowResponse = z.infer<typeof WeatherNowResponseSchema>;

export const WeatherDailyResponseSchema = DynamicEnvelopeSchema.extend({
  daily: z.array(DailyForecastSchema),
});

export type WeatherDailyResponse = z.infer<typeof WeatherDailyResponseSchema>;

/**
 * Real-time weather for a LocationID or "lon,lat" pair
 */
export async function weatherNow(
  client: QWeatherClient,
  input: WeatherNowInput,
  options?: RequestOptions
): Promise<ApiResult<WeatherNowResponse>> {
  const args = validateInput(WeatherNowInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/weather/now`,
    { location: args.data.location },
    WeatherNowResponseSchema,
    options
  );
}

/**
 * Daily forecast for the next 3, 7, 10, 15 or 30 days
 */
export async function weatherDailyForecast(
  client: QWeatherClient,
  input: WeatherDailyInput,
  options?: RequestOptions
): Promise<ApiResult<WeatherDailyResponse>> {
  const args = validateInput(WeatherDailyInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/weather/${args.data.days}d`,
    { location: args.data.location },
    WeatherDailyResponseSchema,
    options
  );
}

/**
 * Hourly forecast for the next 24, 72 or 168 hours
 *
 * Decoded through the dynamic payload variant set; a successful result
 * normally carries `kind: 'hourly'`.
 */
export async function weatherHourlyForecast(
  client: QWeatherClient,
  input: WeatherHourlyInput,
  options?: RequestOptions
): Promise<ApiResult<DynamicResponse>> {
  const args = validateInput(WeatherHourlyInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/v7/weather/${args.data.hours}h`,
    { location: args.data.location },
    DynamicResponseSchema,
    options
  );
}
