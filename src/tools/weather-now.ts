/**
 * Weather Now Tool
 * Real-time conditions for a LocationID or coordinate pair
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { weatherNow, type WeatherNowInput } from '../api/weather.js';
import type { WeatherNow } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';
import { unitLabels, type UnitLabels } from './format.js';

export function summarizeNow(location: string, now: WeatherNow, labels: UnitLabels): string {
  const parts = [
    `${now.text}, ${now.temp}${labels.temperature} (feels like ${now.feelsLike}${labels.temperature})`,
    `wind ${now.windDir} ${now.windSpeed} ${labels.speed}`,
    `humidity ${now.humidity}%`,
  ];
  if (now.precip > 0) {
    parts.push(`precipitation ${now.precip} ${labels.precipitation} in the last hour`);
  }

  return `Current weather at ${location}: ${parts.join(', ')}. Observed ${now.obsTime}.`;
}

export async function handleWeatherNow(
  input: WeatherNowInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await weatherNow(client, input);

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('Weather Now', data);
    const location = input.location.trim();

    return {
      structuredContent: {
        source,
        location,
        units: client.getUnit(),
        now: data.now,
      },
      summary: `${summarizeNow(location, data.now, unitLabels(client.getUnit()))} ${formatCredit(source)}`,
    };
  });
}
