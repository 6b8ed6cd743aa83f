/**
 * Air quality (v1): current AQI, hourly and daily forecasts, station data
 *
 * These endpoints have no `code` field. Success bodies carry a `metadata`
 * object; errors come back as `{ "error": { "status": ... } }`.
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { MetadataEnvelopeSchema } from '../domain/schemas/envelope.js';
import {
  formatCoordinate,
  LatitudeSchema,
  LongitudeSchema,
} from '../domain/schemas/common.js';
import type { ApiResult } from '../domain/types.js';
import {
  AirDaySchema,
  AirHourSchema,
  AirQualityIndexSchema,
  PollutantSchema,
} from './schemas.js';

export const AirCoordinateInputSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
});

export type AirCoordinateInput = z.input<typeof AirCoordinateInputSchema>;

export const AirStationInputSchema = z.object({
  stationId: z.string().trim().min(1, 'Station id must not be empty'),
});

export type AirStationInput = z.input<typeof AirStationInputSchema>;

export const AirCurrentResponseSchema = MetadataEnvelopeSchema.extend({
  indexes: z.array(AirQualityIndexSchema),
  pollutants: z.array(PollutantSchema).optional(),
});

export type AirCurrentResponse = z.infer<typeof AirCurrentResponseSchema>;

export const AirHourlyResponseSchema = MetadataEnvelopeSchema.extend({
  hours: z.array(AirHourSchema),
});

export type AirHourlyResponse = z.infer<typeof AirHourlyResponseSchema>;

export const AirDailyResponseSchema = MetadataEnvelopeSchema.extend({
  days: z.array(AirDaySchema),
});

export type AirDailyResponse = z.infer<typeof AirDailyResponseSchema>;

export const AirStationResponseSchema = MetadataEnvelopeSchema.extend({
  pollutants: z.array(PollutantSchema),
});

export type AirStationResponse = z.infer<typeof AirStationResponseSchema>;

type AirProduct = 'current' | 'hourly' | 'daily';

function coordinateUrl(
  client: QWeatherClient,
  product: AirProduct,
  input: z.output<typeof AirCoordinateInputSchema>
): string {
  const lat = formatCoordinate(input.latitude);
  const lon = formatCoordinate(input.longitude);
  return `${client.getApiHost()}/airquality/v1/${product}/${lat}/${lon}`;
}

export async function airCurrent(
  client: QWeatherClient,
  input: AirCoordinateInput,
  options?: RequestOptions
): Promise<ApiResult<AirCurrentResponse>> {
  const args = validateInput(AirCoordinateInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    coordinateUrl(client, 'current', args.data),
    {},
    AirCurrentResponseSchema,
    options
  );
}

export async function airHourlyForecast(
  client: QWeatherClient,
  input: AirCoordinateInput,
  options?: RequestOptions
): Promise<ApiResult<AirHourlyResponse>> {
  const args = validateInput(AirCoordinateInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    coordinateUrl(client, 'hourly', args.data),
    {},
    AirHourlyResponseSchema,
    options
  );
}

export async function airDailyForecast(
  client: QWeatherClient,
  input: AirCoordinateInput,
  options?: RequestOptions
): Promise<ApiResult<AirDailyResponse>> {
  const args = validateInput(AirCoordinateInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    coordinateUrl(client, 'daily', args.data),
    {},
    AirDailyResponseSchema,
    options
  );
}

/**
 * Pollutant readings from one monitoring station
 */
export async function airStation(
  client: QWeatherClient,
  input: AirStationInput,
  options?: RequestOptions
): Promise<ApiResult<AirStationResponse>> {
  const args = validateInput(AirStationInputSchema, input);
  if (!args.ok) {
    return args;
  }

  return client.requestApi(
    `${client.getApiHost()}/airquality/v1/station/${encodeURIComponent(args.data.stationId)}`,
    {},
    AirStationResponseSchema,
    options
  );
}
