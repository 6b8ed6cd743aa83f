/**
 * Air Quality Tool
 * Current AQI and pollutant concentrations for any coordinate
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { airCurrent, AirCoordinateInputSchema, type AirCoordinateInput } from '../api/air-quality.js';
import type { AirQualityIndex } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';

export const AirQualityToolInputSchema = AirCoordinateInputSchema;

export type AirQualityToolInput = AirCoordinateInput;

export function describeIndex(index: AirQualityIndex): string {
  const category = index.category ? ` (${index.category})` : '';
  const primary = index.primaryPollutant ? `, primary pollutant ${index.primaryPollutant.name}` : '';
  return `${index.name}: ${index.aqiDisplay}${category}${primary}`;
}

/**
 * One line per index; health advice from the first index that has any
 */
export function summarizeAirQuality(location: string, indexes: AirQualityIndex[]): string {
  if (indexes.length === 0) {
    return `No air quality index available for ${location}.`;
  }

  const lines = [`Air quality at ${location}:`, ...indexes.map((index) => `- ${describeIndex(index)}`)];
  const advice = indexes.find((index) => index.health)?.health?.advice;
  if (advice) {
    lines.push(`Advice: ${advice.generalPopulation}`);
  }

  return lines.join('\n');
}

export async function handleAirQuality(
  input: AirQualityToolInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await airCurrent(client, input);

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('Air Quality', data);
    const location = `${input.latitude},${input.longitude}`;

    return {
      structuredContent: {
        source,
        location: { latitude: input.latitude, longitude: input.longitude },
        indexes: data.indexes,
        pollutants: data.pollutants ?? [],
      },
      summary: `${summarizeAirQuality(location, data.indexes)}\n${formatCredit(source)}`,
    };
  });
}
