/**
 * Shared MCP server factory
 * Creates the MCP server with all QWeather tools; used by both transports
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './domain/logger.js';
import type { ServerConfig } from './config/env.js';
import { QWeatherClient } from './domain/qweather-client.js';
import { wrapTool } from './domain/tool-wrapper.js';
import { CityLookupInputSchema } from './api/geo.js';
import { WeatherWarningInputSchema } from './api/warning.js';
import { WeatherNowInputSchema } from './api/weather.js';

// Tool imports
import { handleWeatherNow } from './tools/weather-now.js';
import {
  DailyForecastToolInputSchema,
  handleDailyForecast,
} from './tools/daily-forecast.js';
import {
  HourlyForecastToolInputSchema,
  handleHourlyForecast,
} from './tools/hourly-forecast.js';
import {
  MinutelyToolInputSchema,
  handleMinutelyPrecipitation,
} from './tools/minutely-precipitation.js';
import { handleWeatherWarnings } from './tools/weather-warnings.js';
import { handleCityLookup } from './tools/city-lookup.js';
import { AirQualityToolInputSchema, handleAirQuality } from './tools/air-quality.js';

/** Names of the registered tools */
export const TOOL_NAMES = [
  'qweather_get_weather_now',
  'qweather_get_daily_forecast',
  'qweather_get_hourly_forecast',
  'qweather_get_minutely_precipitation',
  'qweather_get_weather_warnings',
  'qweather_lookup_city',
  'qweather_get_air_quality',
] as const;

/**
 * Create and configure the MCP server
 * Returns the configured server (not yet connected to any transport)
 */
export function createMcpServer(
  config: ServerConfig,
  client: QWeatherClient = new QWeatherClient(config.client)
): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    'qweather_get_weather_now',
    {
      description:
        'Get real-time weather (temperature, feels-like, wind, humidity, precipitation, pressure, visibility) for a QWeather LocationID or a "longitude,latitude" pair.',
      inputSchema: WeatherNowInputSchema.shape,
    },
    wrapTool('qweather_get_weather_now', async (args: unknown) => {
      const input = WeatherNowInputSchema.parse(args);
      return handleWeatherNow(input, client);
    })
  );

  server.registerTool(
    'qweather_get_daily_forecast',
    {
      description:
        'Get a daily weather forecast (3, 7, 10, 15 or 30 days) with min/max temperature, day and night conditions, wind, precipitation and UV index.',
      inputSchema: DailyForecastToolInputSchema.shape,
    },
    wrapTool('qweather_get_daily_forecast', async (args: unknown) => {
      const input = DailyForecastToolInputSchema.parse(args);
      return handleDailyForecast(input, client);
    })
  );

  server.registerTool(
    'qweather_get_hourly_forecast',
    {
      description:
        'Get an hourly weather forecast (24, 72 or 168 hours) with temperature, conditions, wind, precipitation and probability of precipitation.',
      inputSchema: HourlyForecastToolInputSchema.shape,
    },
    wrapTool('qweather_get_hourly_forecast', async (args: unknown) => {
      const input = HourlyForecastToolInputSchema.parse(args);
      return handleHourlyForecast(input, client);
    })
  );

  server.registerTool(
    'qweather_get_minutely_precipitation',
    {
      description:
        'Get precipitation in 5-minute steps for the next two hours at a coordinate in China. Answers "will it rain in the next two hours?"',
      inputSchema: MinutelyToolInputSchema.shape,
    },
    wrapTool('qweather_get_minutely_precipitation', async (args: unknown) => {
      const input = MinutelyToolInputSchema.parse(args);
      return handleMinutelyPrecipitation(input, client);
    })
  );

  server.registerTool(
    'qweather_get_weather_warnings',
    {
      description:
        'Get official weather warnings currently in force for a QWeather LocationID or a "longitude,latitude" pair.',
      inputSchema: WeatherWarningInputSchema.shape,
    },
    wrapTool('qweather_get_weather_warnings', async (args: unknown) => {
      const input = WeatherWarningInputSchema.parse(args);
      return handleWeatherWarnings(input, client);
    })
  );

  server.registerTool(
    'qweather_lookup_city',
    {
      description:
        'Search cities by name, LocationID, adcode or coordinates and return their QWeather LocationIDs. Use this before the weather tools when the user names a place.',
      inputSchema: CityLookupInputSchema.shape,
    },
    wrapTool('qweather_lookup_city', async (args: unknown) => {
      const input = CityLookupInputSchema.parse(args);
      return handleCityLookup(input, client);
    })
  );

  server.registerTool(
    'qweather_get_air_quality',
    {
      description:
        'Get the current air quality index (local and QWeather AQI), pollutant concentrations and health advice for a coordinate.',
      inputSchema: AirQualityToolInputSchema.shape,
    },
    wrapTool('qweather_get_air_quality', async (args: unknown) => {
      const input = AirQualityToolInputSchema.parse(args);
      return handleAirQuality(input, client);
    })
  );

  logger.info('MCP server created successfully', { tools: TOOL_NAMES.length });

  return server;
}
