/**
 * Hourly Forecast Tool
 *
 * The hourly endpoint is decoded through the dynamic payload variant set, so
 * the handler checks which variant came back.
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { HOURLY_FORECAST_HOURS, weatherHourlyForecast } from '../api/weather.js';
import type { HourlyForecast } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import { createDecodeError } from '../domain/error-handler.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildErrorResponse, buildToolResponse } from '../domain/response-builder.js';
import { LocationSchema } from '../domain/schemas/common.js';
import { unitLabels, type UnitLabels } from './format.js';

export const HourlyForecastToolInputSchema = z.object({
  location: LocationSchema,
  hours: z
    .number()
    .int()
    .default(24)
    .describe(`Forecast length in hours: ${HOURLY_FORECAST_HOURS.join(', ')} (default 24)`),
});

export type HourlyForecastToolInput = z.infer<typeof HourlyForecastToolInputSchema>;

/**
 * Temperature range, wettest hour and peak precipitation probability
 */
export function summarizeHourly(
  location: string,
  hourly: HourlyForecast[],
  labels: UnitLabels
): string {
  const [first] = hourly;
  if (!first) {
    return `No hourly forecast available for ${location}.`;
  }

  const low = Math.min(...hourly.map((hour) => hour.temp));
  const high = Math.max(...hourly.map((hour) => hour.temp));
  const lines = [
    `${hourly.length}-hour forecast for ${location} from ${first.fxTime}: ${low} to ${high}${labels.temperature}.`,
  ];

  const wettest = hourly.reduce((best, hour) => (hour.precip > best.precip ? hour : best), first);
  if (wettest.precip > 0) {
    lines.push(`Heaviest precipitation ${wettest.precip} ${labels.precipitation} at ${wettest.fxTime}.`);
  } else {
    lines.push('No precipitation expected.');
  }

  const pops = hourly.flatMap((hour) => (hour.pop === undefined ? [] : [hour.pop]));
  if (pops.length > 0) {
    lines.push(`Highest chance of precipitation ${Math.max(...pops)}%.`);
  }

  return lines.join(' ');
}

export async function handleHourlyForecast(
  input: HourlyForecastToolInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await weatherHourlyForecast(client, input);
  if (!result.ok) {
    return buildErrorResponse(result.error);
  }

  const data = result.data;
  if (data.kind !== 'hourly') {
    return buildErrorResponse(
      createDecodeError([`expected an hourly payload, received ${data.kind}`])
    );
  }

  const source = buildSourceMetadata('Hourly Forecast', data);
  const location = input.location.trim();
  const summary = summarizeHourly(location, data.hourly, unitLabels(client.getUnit()));

  return buildToolResponse(
    {
      source,
      location,
      units: client.getUnit(),
      hours: data.hourly,
    },
    `${summary} ${formatCredit(source)}`
  );
}
