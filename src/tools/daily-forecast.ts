/**
 * Daily Forecast Tool
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { DAILY_FORECAST_DAYS, weatherDailyForecast } from '../api/weather.js';
import type { DailyForecast } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';
import { LocationSchema } from '../domain/schemas/common.js';
import { unitLabels, type UnitLabels } from './format.js';

export const DailyForecastToolInputSchema = z.object({
  location: LocationSchema,
  days: z
    .number()
    .int()
    .default(3)
    .describe(`Forecast length in days: ${DAILY_FORECAST_DAYS.join(', ')} (default 3)`),
});

export type DailyForecastToolInput = z.infer<typeof DailyForecastToolInputSchema>;

function describeDay(day: DailyForecast, labels: UnitLabels): string {
  const sky = day.textDay === day.textNight ? day.textDay : `${day.textDay} then ${day.textNight}`;
  const rain = day.precip > 0 ? `, ${day.precip} ${labels.precipitation}` : '';
  return `${day.fxDate}: ${sky}, ${day.tempMin} to ${day.tempMax}${labels.temperature}${rain}`;
}

/**
 * One line per day, headed by the overall temperature range
 */
export function summarizeDaily(location: string, daily: DailyForecast[], labels: UnitLabels): string {
  if (daily.length === 0) {
    return `No daily forecast available for ${location}.`;
  }

  const low = Math.min(...daily.map((day) => day.tempMin));
  const high = Math.max(...daily.map((day) => day.tempMax));
  const header = `${daily.length}-day forecast for ${location}, temperatures ${low} to ${high}${labels.temperature}.`;

  return [header, ...daily.map((day) => describeDay(day, labels))].join('\n');
}

export async function handleDailyForecast(
  input: DailyForecastToolInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await weatherDailyForecast(client, input);

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('Daily Forecast', data);
    const location = input.location.trim();

    return {
      structuredContent: {
        source,
        location,
        units: client.getUnit(),
        days: data.daily,
      },
      summary: `${summarizeDaily(location, data.daily, unitLabels(client.getUnit()))}\n${formatCredit(source)}`,
    };
  });
}
