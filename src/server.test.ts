/**
 * MCP server tests over an in-memory transport
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { ServerConfig } from './config/env.js';
import { QWeatherClient } from './domain/qweather-client.js';
import { createMcpServer, TOOL_NAMES } from './server.js';
import { createHttpApp } from './transport/http.js';

vi.mock('./domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logError: vi.fn(),
    logToolStart: vi.fn(),
    logToolEnd: vi.fn(),
    logUpstreamCall: vi.fn(),
  },
}));

const config: ServerConfig = {
  client: { publicId: 'test-id', privateKey: 'test-secret' },
  logLevel: 'info',
  serverName: 'qweather',
  serverVersion: '0.1.0',
};

describe('createMcpServer', () => {
  let qweather: QWeatherClient;
  let mcpClient: Client;

  beforeEach(async () => {
    qweather = new QWeatherClient(config.client);
    const server = createMcpServer(config, qweather);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    mcpClient = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), mcpClient.connect(clientTransport)]);
  });

  afterEach(async () => {
    await mcpClient.close();
  });

  it('should register every tool', async () => {
    const { tools } = await mcpClient.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it('should answer a tool call through the client', async () => {
    vi.spyOn(qweather, 'requestApi').mockResolvedValue({
      ok: true,
      data: {
        code: '200',
        now: {
          obsTime: '2020-06-30T21:40+08:00',
          temp: 24,
          feelsLike: 26,
          icon: '101',
          text: 'Cloudy',
          wind360: 123,
          windDir: 'SE',
          windScale: 1,
          windSpeed: 3,
          humidity: 72,
          precip: 0,
          pressure: 1003,
          vis: 16,
        },
        refer: { sources: [], license: [] },
      },
    });

    const result = await mcpClient.callTool({
      name: 'qweather_get_weather_now',
      arguments: { location: '101010100' },
    });

    expect(result).toMatchObject({
      content: [
        {
          type: 'text',
          text: 'Current weather at 101010100: Cloudy, 24°C (feels like 26°C), wind SE 3 km/h, humidity 72%. Observed 2020-06-30T21:40+08:00. Data from QWeather.',
        },
      ],
    });
  });

  it('should return invalid endpoint arguments as a tool error', async () => {
    const requestApi = vi.spyOn(qweather, 'requestApi');

    const result = await mcpClient.callTool({
      name: 'qweather_get_daily_forecast',
      arguments: { location: '101010100', days: 5 },
    });

    expect(requestApi).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: 'text',
          text: 'Invalid input parameters: days: Days must be one of 3, 7, 10, 15, 30',
        },
      ],
    });
  });
});

describe('createHttpApp', () => {
  let listener: Server;

  afterEach(async () => {
    await new Promise<void>((resolve) => listener.close(() => resolve()));
  });

  it('should answer the health check', async () => {
    const app = createHttpApp(createMcpServer(config));
    listener = await new Promise<Server>((resolve) => {
      const started = app.listen(0, () => resolve(started));
    });
    const address = listener.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }

    const response = await fetch(`http://127.0.0.1:${address.port}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', transport: 'http' });
  });
});
