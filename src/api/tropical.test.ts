/**
 * Unit tests for the storm forecast endpoint
 */

import { describe, it, expect, vi } from 'vitest';
import { QWeatherClient } from '../domain/qweather-client.js';
import { resolveEnvelope } from '../domain/envelope.js';
import { stormForecast, StormForecastResponseSchema } from './tropical.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('stormForecast', () => {
  it('should send the storm id as stormid', async () => {
    const client = new QWeatherClient({ publicId: 'test-id', privateKey: 'test-secret' });
    const requestApi = vi.spyOn(client, 'requestApi').mockResolvedValue({ ok: true, data: {} });

    await stormForecast(client, { stormId: 'NP_2421' });

    expect(requestApi).toHaveBeenCalledWith(
      'https://devapi.qweather.com/v7/tropical/storm-forecast',
      { stormid: 'NP_2421' },
      StormForecastResponseSchema,
      undefined
    );
  });

  it('should decode forecast points with empty movement fields', () => {
    const body = {
      code: '200',
      updateTime: '2021-07-27T20:00+08:00',
      fxLink: 'https://www.qweather.com',
      forecast: [
        {
          fxTime: '2021-07-28T02:00+08:00',
          lat: '31.7',
          lon: '119.8',
          type: 'TS',
          pressure: '990',
          windSpeed: '18',
          moveSpeed: '',
          moveDir: '',
          move360: '',
        },
      ],
    };

    const result = resolveEnvelope(body, StormForecastResponseSchema);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.forecast[0]).toEqual({
        fxTime: '2021-07-28T02:00+08:00',
        lat: 31.7,
        lon: 119.8,
        type: 'TS',
        pressure: 990,
        windSpeed: 18,
        moveSpeed: undefined,
        moveDir: undefined,
        move360: undefined,
      });
    }
  });
});
