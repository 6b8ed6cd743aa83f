/**
 * Unit tests for QWeatherClient
 * Tests signing, dispatch and envelope resolution with mocked fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { QWeatherClient, type ClientConfig } from './qweather-client.js';
import { numberField } from './coercion.js';
import { runWithContext } from './request-context.js';
import { computeSignature } from './signer.js';
import { StatusCodeSchema } from './schemas/envelope.js';

vi.mock('./logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logUpstreamCall: vi.fn(),
  },
}));

import { logger } from './logger.js';

const mockFetch = vi.fn();

const TempSchema = z.object({
  code: StatusCodeSchema,
  temp: numberField(),
});

const baseConfig: ClientConfig = {
  publicId: 'id1',
  privateKey: 'key1',
  now: () => 1700000000000,
};

const NOW_URL = 'https://devapi.qweather.com/v7/weather/now';
const SIGNED_QUERY =
  'location=101010100&publicid=id1&t=1700000000&sign=8ccfc223643869a2e9364f9a4c4cd295';

function respondWith(status: number, body: string) {
  mockFetch.mockResolvedValue({
    status,
    text: async () => body,
  });
}

/**
 * fetch that only settles when its signal aborts
 */
function hangUntilAborted() {
  mockFetch.mockImplementation(
    (_url: string, init: RequestInit) =>
      new Promise((_resolve, reject) => {
        const abort = () => reject(new DOMException('This operation was aborted', 'AbortError'));
        if (init.signal?.aborted) {
          abort();
          return;
        }
        init.signal?.addEventListener('abort', abort);
      })
  );
}

describe('QWeatherClient', () => {
  let client: QWeatherClient;

  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    client = new QWeatherClient(baseConfig);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('Constructor', () => {
    it('should use the free-tier host by default', () => {
      expect(client.getApiHost()).toBe('https://devapi.qweather.com');
      expect(client.getGeoApiHost()).toBe('https://geoapi.qweather.com');
    });

    it('should use the subscription host when subscribed', () => {
      const paid = new QWeatherClient({ ...baseConfig, subscription: true });

      expect(paid.getApiHost()).toBe('https://api.qweather.com');
    });

    it('should strip a trailing slash from host overrides', () => {
      const custom = new QWeatherClient({
        ...baseConfig,
        apiHost: 'https://abc123.qweatherapi.com/',
        geoApiHost: 'https://geo.example.test/',
      });

      expect(custom.getApiHost()).toBe('https://abc123.qweatherapi.com');
      expect(custom.getGeoApiHost()).toBe('https://geo.example.test');
    });

    it('should default to metric units', () => {
      expect(client.getUnit()).toBe('m');
      expect(new QWeatherClient({ ...baseConfig, unit: 'i' }).getUnit()).toBe('i');
    });

    it('should log the configuration without credentials', () => {
      expect(logger.info).toHaveBeenCalledWith('QWeatherClient initialized', {
        apiHost: 'https://devapi.qweather.com',
        geoApiHost: 'https://geoapi.qweather.com',
        subscription: false,
        lang: undefined,
        unit: undefined,
        defaultTimeout: 10000,
      });
    });
  });

  describe('signRequest()', () => {
    it('should add publicid, timestamp and signature', () => {
      expect(client.signRequest({ location: '101010100' })).toEqual({
        location: '101010100',
        publicid: 'id1',
        t: '1700000000',
        sign: '8ccfc223643869a2e9364f9a4c4cd295',
      });
    });

    it('should floor the clock to whole seconds', () => {
      const late = new QWeatherClient({ ...baseConfig, now: () => 1700000000999 });

      expect(late.signRequest({}).t).toBe('1700000000');
    });

    it('should include lang and unit when configured', () => {
      const localized = new QWeatherClient({ ...baseConfig, lang: 'en', unit: 'i' });

      const signed = localized.signRequest({ location: '101010100' });

      expect(signed).toEqual({
        location: '101010100',
        publicid: 'id1',
        lang: 'en',
        unit: 'i',
        t: '1700000000',
        sign: computeSignature(
          { lang: 'en', location: '101010100', publicid: 'id1', t: '1700000000', unit: 'i' },
          'key1'
        ),
      });
    });

    it('should let persistent parameters win and never send key', () => {
      const signed = client.signRequest({
        location: '101010100',
        publicid: 'someone-else',
        key: 'test-secret',
      });

      expect(signed).toEqual({
        location: '101010100',
        publicid: 'id1',
        t: '1700000000',
        sign: '8ccfc223643869a2e9364f9a4c4cd295',
      });
    });

    it('should drop credential and signature keys in any letter case', () => {
      const signed = client.signRequest({
        location: '101010100',
        KEY: 'test-secret',
        Sign: 'stale',
      });

      expect(signed).toEqual({
        location: '101010100',
        publicid: 'id1',
        t: '1700000000',
        sign: '8ccfc223643869a2e9364f9a4c4cd295',
      });
    });

    it('should sign each request independently', () => {
      let clock = 1700000000000;
      const ticking = new QWeatherClient({ ...baseConfig, now: () => clock });

      const first = ticking.signRequest({ location: '101010100' });
      clock += 60_000;
      const second = ticking.signRequest({ location: '101010100' });

      expect(first.t).toBe('1700000000');
      expect(second.t).toBe('1700000060');
      expect(first.sign).not.toBe(second.sign);
    });
  });

  describe('requestApi() - Success Cases', () => {
    it('should send a signed GET and decode the body', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: '24' }));

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        requestId: 'req-1',
      });

      expect(mockFetch).toHaveBeenCalledWith(
        `${NOW_URL}?${SIGNED_QUERY}`,
        expect.objectContaining({
          method: 'GET',
          signal: expect.any(AbortSignal),
        })
      );
      expect(result).toEqual({ ok: true, data: { code: '200', temp: 24 } });
    });

    it('should URL-encode values once, at transport time', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: 1 }));

      await client.requestApi(NOW_URL, { location: '116.41,39.92' }, TempSchema);

      const [url] = mockFetch.mock.calls[0] ?? [];
      expect(url).toContain('location=116.41%2C39.92&');
    });

    it('should log the upstream call', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: 1 }));

      await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        requestId: 'req-1',
      });

      expect(logger.logUpstreamCall).toHaveBeenCalledWith(
        `${NOW_URL}?${SIGNED_QUERY}`,
        200,
        expect.any(Number),
        'req-1'
      );
    });

    it('should take the request id from the enclosing context', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: 1 }));

      await runWithContext({ requestId: 'ctx-1' }, () =>
        client.requestApi(NOW_URL, { location: '101010100' }, TempSchema)
      );

      expect(logger.debug).toHaveBeenCalledWith('QWeather request starting', {
        requestId: 'ctx-1',
        url: NOW_URL,
      });
    });

    it('should generate a request id otherwise', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: 1 }));

      await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema);

      expect(logger.debug).toHaveBeenCalledWith('QWeather request starting', {
        requestId: expect.any(String),
        url: NOW_URL,
      });
    });
  });

  describe('requestApi() - Error Cases', () => {
    it('should return a provider error for a non-success code', async () => {
      respondWith(200, JSON.stringify({ code: '401' }));

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema);

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'PROVIDER_ERROR',
          message: 'QWeather API returned status code 401',
          retryable: false,
          details: { providerCode: '401' },
        },
      });
    });

    it('should branch on the body, not the HTTP status', async () => {
      respondWith(403, JSON.stringify({ code: '403' }));

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('PROVIDER_ERROR');
        expect(result.error.details?.providerCode).toBe('403');
      }
    });

    it('should return a decode error for a malformed payload', async () => {
      respondWith(200, JSON.stringify({ code: '200', temp: 'warm' }));

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema);

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'DECODE_ERROR',
          message: 'decode failed',
          retryable: false,
          details: { issues: ['temp: expected a number, received "warm"'] },
        },
      });
    });

    it('should return a transport error for a non-JSON body', async () => {
      respondWith(502, '<html>Bad Gateway</html>');

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        requestId: 'req-1',
      });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'TRANSPORT_ERROR',
          message: 'QWeather API returned a response body that is not valid JSON.',
          retryable: true,
          details: { httpStatus: 502, requestId: 'req-1' },
        },
      });
    });

    it('should return a transport error when fetch rejects', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        requestId: 'req-1',
      });

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'TRANSPORT_ERROR',
          message: 'Unable to reach QWeather API: fetch failed',
          retryable: true,
          details: { requestId: 'req-1', networkError: 'fetch failed' },
        },
      });
    });

    it('should return a transport error on timeout', async () => {
      hangUntilAborted();

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        timeoutMs: 10,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TRANSPORT_ERROR');
        expect(result.error.message).toBe('Unable to reach QWeather API: Request timeout after 10ms');
      }
    });

    it('should return a transport error when the caller aborts', async () => {
      hangUntilAborted();
      const controller = new AbortController();
      controller.abort();

      const result = await client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        signal: controller.signal,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Unable to reach QWeather API: Request aborted by caller');
      }
    });

    it('should abort an in-flight request when the caller signal fires', async () => {
      hangUntilAborted();
      const controller = new AbortController();

      const pending = client.requestApi(NOW_URL, { location: '101010100' }, TempSchema, {
        signal: controller.signal,
      });
      controller.abort();
      const result = await pending;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TRANSPORT_ERROR');
        expect(result.error.message).toBe('Unable to reach QWeather API: Request aborted by caller');
      }
    });
  });
});
