/**
 * Payload record schemas
 *
 * Scalar fields go through the coercion factories: the provider sends most
 * numbers as strings, some as numbers, and optional ones as "" or not at all.
 */

import { z } from 'zod';
import {
  booleanField,
  integerField,
  numberField,
  optionalIntegerField,
  optionalNumberField,
  optionalStringField,
} from '../domain/coercion.js';
import {
  ColorSchema,
  DateSchema,
  OptionalTimestampSchema,
  TimestampSchema,
} from '../domain/schemas/common.js';

// ---------------------------------------------------------------------------
// Weather
// ---------------------------------------------------------------------------

export const WeatherNowSchema = z.object({
  obsTime: TimestampSchema,
  temp: numberField(),
  feelsLike: numberField(),
  icon: z.string(),
  text: z.string(),
  wind360: numberField(),
  windDir: z.string(),
  windScale: numberField(),
  windSpeed: numberField(),
  humidity: numberField(),
  precip: numberField(),
  pressure: numberField(),
  vis: numberField(),
  cloud: optionalNumberField(),
  dew: optionalNumberField(),
});

export type WeatherNow = z.infer<typeof WeatherNowSchema>;

export const DailyForecastSchema = z.object({
  fxDate: DateSchema,
  // Empty near the poles
  sunrise: optionalStringField(),
  sunset: optionalStringField(),
  moonrise: optionalStringField(),
  moonset: optionalStringField(),
  moonPhase: z.string(),
  moonPhaseIcon: z.string(),
  tempMax: numberField(),
  tempMin: numberField(),
  iconDay: z.string(),
  textDay: z.string(),
  iconNight: z.string(),
  textNight: z.string(),
  wind360Day: numberField(),
  windDirDay: z.string(),
  /** Beaufort range such as "1-3" */
  windScaleDay: z.string(),
  windSpeedDay: numberField(),
  wind360Night: numberField(),
  windDirNight: z.string(),
  windScaleNight: z.string(),
  windSpeedNight: numberField(),
  precip: numberField(),
  uvIndex: numberField(),
  humidity: numberField(),
  pressure: numberField(),
  vis: numberField(),
  cloud: optionalNumberField(),
});

export type DailyForecast = z.infer<typeof DailyForecastSchema>;

export const HourlyForecastSchema = z.object({
  fxTime: TimestampSchema,
  temp: numberField(),
  icon: z.string(),
  text: z.string(),
  wind360: numberField(),
  windDir: z.string(),
  windScale: z.string(),
  windSpeed: numberField(),
  humidity: numberField(),
  /** Probability of precipitation, percent */
  pop: optionalNumberField(),
  precip: numberField(),
  pressure: numberField(),
  cloud: optionalNumberField(),
  dew: optionalNumberField(),
});

export type HourlyForecast = z.infer<typeof HourlyForecastSchema>;

// ---------------------------------------------------------------------------
// Grid weather
// ---------------------------------------------------------------------------

export const GridWeatherNowSchema = z.object({
  obsTime: TimestampSchema,
  temp: numberField(),
  icon: z.string(),
  text: z.string(),
  wind360: numberField(),
  windDir: z.string(),
  windScale: numberField(),
  windSpeed: numberField(),
  humidity: numberField(),
  precip: numberField(),
  pressure: numberField(),
  cloud: optionalNumberField(),
  dew: optionalNumberField(),
});

export type GridWeatherNow = z.infer<typeof GridWeatherNowSchema>;

export const GridDailyForecastSchema = z.object({
  fxDate: DateSchema,
  tempMax: numberField(),
  tempMin: numberField(),
  iconDay: z.string(),
  textDay: z.string(),
  iconNight: z.string(),
  textNight: z.string(),
  wind360Day: numberField(),
  windDirDay: z.string(),
  windScaleDay: z.string(),
  windSpeedDay: numberField(),
  wind360Night: numberField(),
  windDirNight: z.string(),
  windScaleNight: z.string(),
  windSpeedNight: numberField(),
  precip: numberField(),
  humidity: numberField(),
  pressure: numberField(),
});

export type GridDailyForecast = z.infer<typeof GridDailyForecastSchema>;

export const GridHourlyForecastSchema = z.object({
  fxTime: TimestampSchema,
  temp: numberField(),
  icon: z.string(),
  text: z.string(),
  wind360: numberField(),
  windDir: z.string(),
  windScale: z.string(),
  windSpeed: numberField(),
  humidity: numberField(),
  precip: numberField(),
  pressure: numberField(),
  cloud: optionalNumberField(),
  dew: optionalNumberField(),
});

export type GridHourlyForecast = z.infer<typeof GridHourlyForecastSchema>;

// ---------------------------------------------------------------------------
// Minutely precipitation
// ---------------------------------------------------------------------------

export const MinutelySchema = z.object({
  fxTime: TimestampSchema,
  precip: numberField(),
  /** "rain" or "snow" */
  type: z.string(),
});

export type Minutely = z.infer<typeof MinutelySchema>;

// ---------------------------------------------------------------------------
// Warnings
// ---------------------------------------------------------------------------

export const WarningSchema = z.object({
  id: z.string(),
  sender: optionalStringField(),
  pubTime: TimestampSchema,
  title: z.string(),
  startTime: OptionalTimestampSchema,
  endTime: OptionalTimestampSchema,
  status: z.string(),
  severity: z.string(),
  severityColor: optionalStringField(),
  type: z.string(),
  typeName: z.string(),
  urgency: optionalStringField(),
  certainty: optionalStringField(),
  text: z.string(),
  related: optionalStringField(),
});

export type Warning = z.infer<typeof WarningSchema>;

export const WarningLocationSchema = z.object({
  locationId: z.string(),
});

export type WarningLocation = z.infer<typeof WarningLocationSchema>;

// ---------------------------------------------------------------------------
// Indices
// ---------------------------------------------------------------------------

export const DailyIndexSchema = z.object({
  date: DateSchema,
  type: integerField(),
  name: z.string(),
  level: integerField(),
  category: z.string(),
  text: optionalStringField(),
});

export type DailyIndex = z.infer<typeof DailyIndexSchema>;

// ---------------------------------------------------------------------------
// Tropical storms
// ---------------------------------------------------------------------------

export const StormForecastSchema = z.object({
  fxTime: TimestampSchema,
  lat: numberField(),
  lon: numberField(),
  /** Storm category, e.g. TS, STS, TY */
  type: z.string(),
  pressure: numberField(),
  windSpeed: numberField(),
  moveSpeed: optionalNumberField(),
  moveDir: optionalStringField(),
  move360: optionalNumberField(),
});

export type StormForecast = z.infer<typeof StormForecastSchema>;

// ---------------------------------------------------------------------------
// GeoAPI
// ---------------------------------------------------------------------------

/**
 * City or POI record; both lookups share the field list
 */
export const GeoLocationSchema = z.object({
  name: z.string(),
  id: z.string(),
  lat: numberField(),
  lon: numberField(),
  adm2: z.string(),
  adm1: z.string(),
  country: z.string(),
  tz: z.string(),
  utcOffset: z.string(),
  isDst: booleanField(),
  type: z.string(),
  rank: integerField(),
  fxLink: optionalStringField(),
});

export type GeoLocation = z.infer<typeof GeoLocationSchema>;

// ---------------------------------------------------------------------------
// Air quality (v1)
// ---------------------------------------------------------------------------

export const PrimaryPollutantSchema = z.object({
  code: z.string(),
  name: z.string(),
  fullName: z.string(),
});

export const HealthSchema = z.object({
  effect: optionalStringField(),
  advice: z.object({
    generalPopulation: z.string(),
    sensitivePopulation: z.string(),
  }),
});

export const AirQualityIndexSchema = z.object({
  code: z.string(),
  name: z.string(),
  aqi: numberField(),
  aqiDisplay: z.string(),
  level: optionalIntegerField(),
  category: optionalStringField(),
  color: ColorSchema,
  primaryPollutant: PrimaryPollutantSchema.nullish().transform((value) => value ?? undefined),
  health: HealthSchema.nullish().transform((value) => value ?? undefined),
});

export type AirQualityIndex = z.infer<typeof AirQualityIndexSchema>;

export const PollutantSchema = z.object({
  code: z.string(),
  name: z.string(),
  fullName: z.string(),
  concentration: z.object({
    value: numberField(),
    unit: z.string(),
  }),
  subIndexes: z
    .array(
      z.object({
        code: z.string(),
        aqi: numberField(),
        aqiDisplay: z.string(),
      })
    )
    .optional(),
});

export type Pollutant = z.infer<typeof PollutantSchema>;

export const AirHourSchema = z.object({
  forecastTime: TimestampSchema,
  indexes: z.array(AirQualityIndexSchema),
  pollutants: z.array(PollutantSchema).optional(),
});

export type AirHour = z.infer<typeof AirHourSchema>;

export const AirDaySchema = z.object({
  forecastStartTime: TimestampSchema,
  forecastEndTime: TimestampSchema,
  indexes: z.array(AirQualityIndexSchema),
  pollutants: z.array(PollutantSchema).optional(),
});

export type AirDay = z.infer<typeof AirDaySchema>;
