/**
 * Weather Warnings Tool
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { weatherWarning, type WeatherWarningInput } from '../api/warning.js';
import type { Warning } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';
import { plural } from './format.js';

export function summarizeWarnings(location: string, warnings: Warning[]): string {
  if (warnings.length === 0) {
    return `No weather warnings in force for ${location}.`;
  }

  const lines = warnings.map((warning) => {
    const until = warning.endTime ? ` until ${warning.endTime}` : '';
    return `- ${warning.title} [${warning.severity}]${until}`;
  });

  return [`${plural(warnings.length, 'warning')} in force for ${location}:`, ...lines].join('\n');
}

export async function handleWeatherWarnings(
  input: WeatherWarningInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await weatherWarning(client, input);

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('Weather Warning', data);
    const location = input.location.trim();

    return {
      structuredContent: {
        source,
        location,
        warnings: data.warning,
      },
      summary: `${summarizeWarnings(location, data.warning)}\n${formatCredit(source)}`,
    };
  });
}
