/**
 * Payload variant sets for endpoints whose payload shape is not known in
 * advance
 *
 * The declared order is part of the contract: `discriminate` tries the
 * variants in this order and keeps the first structural match.
 */

import { z } from 'zod';
import { defineShapes, shape, shapeSchema } from '../domain/shape.js';
import { DynamicEnvelopeSchema, StaticEnvelopeSchema } from '../domain/schemas/envelope.js';
import {
  DailyForecastSchema,
  GeoLocationSchema,
  HourlyForecastSchema,
  MinutelySchema,
  WeatherNowSchema,
  type DailyForecast,
  type GeoLocation,
  type HourlyForecast,
  type Minutely,
  type WeatherNow,
} from './schemas.js';

export type DynamicPayload =
  | { kind: 'now'; now: WeatherNow }
  | { kind: 'daily'; daily: DailyForecast[] }
  | { kind: 'hourly'; hourly: HourlyForecast[] }
  | { kind: 'minutely'; summary: string; minutely: Minutely[] };

export const DynamicShapes = defineShapes<DynamicPayload>(
  shape('now', ['now'], z.object({ now: WeatherNowSchema })),
  shape('daily', ['daily'], z.object({ daily: z.array(DailyForecastSchema) })),
  shape('hourly', ['hourly'], z.object({ hourly: z.array(HourlyForecastSchema) })),
  shape(
    'minutely',
    ['minutely', 'summary'],
    z.object({ summary: z.string(), minutely: z.array(MinutelySchema) })
  )
);

export type StaticPayload =
  | { kind: 'location'; location: GeoLocation[] }
  | { kind: 'topCityList'; topCityList: GeoLocation[] }
  | { kind: 'poi'; poi: GeoLocation[] };

export const StaticShapes = defineShapes<StaticPayload>(
  shape('location', ['location'], z.object({ location: z.array(GeoLocationSchema) })),
  shape('topCityList', ['topCityList'], z.object({ topCityList: z.array(GeoLocationSchema) })),
  shape('poi', ['poi'], z.object({ poi: z.array(GeoLocationSchema) }))
);

export const DynamicResponseSchema = DynamicEnvelopeSchema.and(shapeSchema(DynamicShapes));

export type DynamicResponse = z.infer<typeof DynamicResponseSchema>;

export const StaticResponseSchema = StaticEnvelopeSchema.and(shapeSchema(StaticShapes));

export type StaticResponse = z.infer<typeof StaticResponseSchema>;
