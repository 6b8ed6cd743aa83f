/**
 * City Lookup Tool
 * Resolves a place name to QWeather LocationIDs and coordinates. Use this
 * before the weather tools when the user gives a city name.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { geoCityLookup, type CityLookupInput } from '../api/geo.js';
import type { GeoLocation } from '../api/schemas.js';
import { buildSourceMetadata, formatCredit } from '../domain/attribution.js';
import type { QWeatherClient } from '../domain/qweather-client.js';
import { buildResultResponse } from '../domain/response-builder.js';
import { plural } from './format.js';

export function describeLocation(location: GeoLocation): string {
  const region = [location.adm2, location.adm1, location.country]
    .filter((part, i, all) => part && part !== location.name && all.indexOf(part) === i)
    .join(', ');
  return `${location.name}${region ? ` (${region})` : ''}: id ${location.id}, ${location.lat},${location.lon}`;
}

export async function handleCityLookup(
  input: CityLookupInput,
  client: QWeatherClient
): Promise<CallToolResult> {
  const result = await geoCityLookup(client, input);

  return buildResultResponse(result, (data) => {
    const source = buildSourceMetadata('GeoAPI City Lookup', data);
    const query = input.location.trim();
    const header =
      data.location.length > 0
        ? `${plural(data.location.length, 'match', 'matches')} for "${query}":`
        : `No locations found for "${query}".`;

    return {
      structuredContent: {
        source,
        query,
        locations: data.location,
      },
      summary: [header, ...data.location.map(describeLocation), formatCredit(source)].join('\n'),
    };
  });
}
