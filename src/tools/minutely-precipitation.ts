/**
 * Minutely Precipitation Tool
 * "Will it rain in the next two hours?" for coordinates in China
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { minutelyPrecipitation } from '../api/minutely.js';
import type { Minutely } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';
import {
  formatCoordinate,
  LatitudeSchema,
  LongitudeSchema,
} from '../domain/schemas/common.js';

export const MinutelyToolInputSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
});

export type MinutelyToolInput = z.infer<typeof MinutelyToolInputSchema>;

/**
 * First 5-minute step with precipitation, if any
 */
export function firstWetStep(minutely: Minutely[]): Minutely | undefined {
  return minutely.find((step) => step.precip > 0);
}

export async function handleMinutelyPrecipitation(
  input: MinutelyToolInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  // The provider takes "longitude,latitude"
  const location = `${formatCoordinate(input.longitude)},${formatCoordinate(input.latitude)}`;
  const result = await minutelyPrecipitation(client, { location });

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('Minutely Precipitation', data);
    const wet = firstWetStep(data.minutely);
    const outlook = wet
      ? `First ${wet.type} expected at ${wet.fxTime}.`
      : 'No precipitation in the next two hours.';

    return {
      structuredContent: {
        source,
        location: { latitude: input.latitude, longitude: input.longitude },
        summary: data.summary,
        minutely: data.minutely,
      },
      summary: `${data.summary} ${outlook} ${formatCredit(source)}`,
    };
  });
}
