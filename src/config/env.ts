/**
 * Configuration for the QWeather MCP server
 * Loads and validates environment variables
 */

import type { ClientConfig } from '../domain/qweather-client.js';
import { LOG_LEVELS, type LogLevel } from '../domain/logger.js';
import type { UnitSystem } from '../domain/types.js';

export interface ServerConfig {
  // QWeather client
  client: ClientConfig;

  // Server configuration
  mcpPort?: number;
  logLevel: LogLevel;

  // Server metadata
  serverName: string;
  serverVersion: string;
}

type Env = Record<string, string | undefined>;

const UNITS: readonly UnitSystem[] = ['m', 'i'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isUnit(value: string): value is UnitSystem {
  return UNITS.some((unit) => unit === value);
}

function readUrl(env: Env, name: string): string | undefined {
  const value = env[name];
  if (!value) {
    return undefined;
  }

  try {
    new URL(value);
  } catch {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return value;
}

function readPositiveInt(env: Env, name: string): number | undefined {
  const value = env[name];
  if (!value) {
    return undefined;
  }

  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new Error(`Invalid ${name}: ${value} (expected a positive integer)`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  // Required: credentials
  const publicId = env.QWEATHER_PUBLIC_ID;
  if (!publicId) {
    throw new Error('QWEATHER_PUBLIC_ID is required. Find it in the QWeather console under Projects.');
  }

  const privateKey = env.QWEATHER_PRIVATE_KEY;
  if (!privateKey) {
    throw new Error('QWEATHER_PRIVATE_KEY is required.');
  }

  const subscription = (env.QWEATHER_SUBSCRIPTION || 'false').toLowerCase() === 'true';
  const apiHost = readUrl(env, 'QWEATHER_API_HOST');
  const geoApiHost = readUrl(env, 'QWEATHER_GEO_API_HOST');

  // Optional: language and unit sent with every request
  const lang = env.QWEATHER_LANG || undefined;

  const rawUnit = env.QWEATHER_UNIT;
  let unit: UnitSystem | undefined;
  if (rawUnit) {
    if (!isUnit(rawUnit)) {
      throw new Error(`Invalid QWEATHER_UNIT: ${rawUnit} (expected m or i)`);
    }
    unit = rawUnit;
  }

  const timeoutMs = readPositiveInt(env, 'QWEATHER_TIMEOUT_MS') ?? 10000;

  // Optional: HTTP transport port
  const mcpPort = readPositiveInt(env, 'QWEATHER_MCP_PORT');

  // Log level
  const rawLogLevel = env.QWEATHER_LOG_LEVEL || 'info';
  if (!isLogLevel(rawLogLevel)) {
    throw new Error(`Invalid QWEATHER_LOG_LEVEL: ${rawLogLevel}`);
  }

  return {
    client: {
      publicId,
      privateKey,
      subscription,
      apiHost,
      geoApiHost,
      lang,
      unit,
      timeoutMs,
    },
    mcpPort,
    logLevel: rawLogLevel,
    serverName: 'qweather',
    serverVersion: '0.1.0',
  };
}

// Singleton config instance
let configInstance: ServerConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
