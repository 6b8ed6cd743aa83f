/**
 * GeoAPI: city search, popular cities and points of interest
 */

import { z } from 'zod';
import type { QWeatherClient, RequestOptions } from '../domain/qweather-client.js';
import { validateInput } from '../domain/error-handler.js';
import { StaticEnvelopeSchema } from '../domain/schemas/envelope.js';
import { LocationSchema, RangeSchema, ResultCountSchema } from '../domain/schemas/common.js';
import type { ApiResult, ParamMap } from '../domain/types.js';
import { StaticResponseSchema, type StaticResponse } from './payloads.js';
import { GeoLocationSchema } from './schemas.js';

export const PoiTypeSchema = z
  .enum(['scenic', 'CSTA', 'TSTA'])
  .describe('scenic: scenic spots, CSTA: tide stations, TSTA: sunrise/sunset stations');

export type PoiType = z.infer<typeof PoiTypeSchema>;

export const CityLookupInputSchema = z.object({
  location: LocationSchema.describe('City name, LocationID, adcode or "longitude,latitude"'),
  adm: z.string().trim().min(1).optional().describe('Superior administrative division'),
  range: RangeSchema.optional(),
  number: ResultCountSchema.optional(),
});

export type CityLookupInput = z.input<typeof CityLookupInputSchema>;

export const CityTopInputSchema = z.object({
  range: RangeSchema.optional(),
  number: ResultCountSchema.optional(),
});

export type CityTopInput = z.input<typeof CityTopInputSchema>;

export const PoiLookupInputSchema = z.object({
  location: LocationSchema,
  type: PoiTypeSchema,
  city: z.string().trim().min(1).optional(),
  number: ResultCountSchema.optional(),
});

export type PoiLookupInput = z.input<typeof PoiLookupInputSchema>;

export const PoiRangeInputSchema = z.object({
  location: LocationSchema.describe('"longitude,latitude" centre of the search'),
  type: PoiTypeSchema,
  radius: z
    .number()
    .min(1, 'Radius must be between 1 and 50 km')
    .max(50, 'Radius must be between 1 and 50 km')
    .optional(),
  number: ResultCountSchema.optional(),
});

export type PoiRangeInput = z.input<typeof PoiRangeInputSchema>;

export const CityLookupResponseSchema = StaticEnvelopeSchema.extend({
  location: z.array(GeoLocationSchema),
});

export type CityLookupResponse = z.infer<typeof CityLookupResponseSchema>;

/**
 * Keep only the optional parameters that were given
 */
function withOptional(
  params: Record<string, string>,
  optional: Record<string, string | number | undefined>
): ParamMap {
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) {
      params[key] = String(value);
    }
  }
  return params;
}

export async function geoCityLookup(
  client: QWeatherClient,
  input: CityLookupInput,
  options?: RequestOptions
): Promise<ApiResult<CityLookupResponse>> {
  const args = validateInput(CityLookupInputSchema, input);
  if (!args.ok) {
    return args;
  }

  const { location, adm, range, number } = args.data;
  return client.requestApi(
    `${client.getGeoApiHost()}/v2/city/lookup`,
    withOptional({ location }, { adm, range, number }),
    CityLookupResponseSchema,
    options
  );
}

export async function geoCityTop(
  client: QWeatherClient,
  input: CityTopInput = {},
  options?: RequestOptions
): Promise<ApiResult<StaticResponse>> {
  const args = validateInput(CityTopInputSchema, input);
  if (!args.ok) {
    return args;
  }

  const { range, number } = args.data;
  return client.requestApi(
    `${client.getGeoApiHost()}/v2/city/top`,
    withOptional({}, { range, number }),
    StaticResponseSchema,
    options
  );
}

export async function geoPoiLookup(
  client: QWeatherClient,
  input: PoiLookupInput,
  options?: RequestOptions
): Promise<ApiResult<StaticResponse>> {
  const args = validateInput(PoiLookupInputSchema, input);
  if (!args.ok) {
    return args;
  }

  const { location, type, city, number } = args.data;
  return client.requestApi(
    `${client.getGeoApiHost()}/v2/poi/lookup`,
    withOptional({ location, type }, { city, number }),
    StaticResponseSchema,
    options
  );
}

export async function geoPoiRange(
  client: QWeatherClient,
  input: PoiRangeInput,
  options?: RequestOptions
): Promise<ApiResult<StaticResponse>> {
  const args = validateInput(PoiRangeInputSchema, input);
  if (!args.ok) {
    return args;
  }

  const { location, type, radius, number } = args.data;
  return client.requestApi(
    `${client.getGeoApiHost()}/v2/poi/range`,
    withOptional({ location, type }, { radius, number }),
    StaticResponseSchema,
    options
  );
}
