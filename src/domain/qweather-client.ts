/**
 * HTTP client for the QWeather API
 */

import type { z } from 'zod';
import { isExcludedKey } from './canonical.js';
import { resolveEnvelope } from './envelope.js';
import { createMalformedBodyError, failure, handleNetworkError } from './error-handler.js';
import { logger } from './logger.js';
import { generateRequestId, getRequestId } from './request-context.js';
import { md5Hex, signParams, type DigestFn } from './signer.js';
import type { ApiResult, ParamMap, UnitSystem } from './types.js';

/** Weather API host for paid subscriptions */
export const WEATHER_API_URL = 'https://api.qweather.com';
/** Weather API host for the free tier */
export const WEATHER_DEV_API_URL = 'https://devapi.qweather.com';
/** GeoAPI host */
export const GEO_API_URL = 'https://geoapi.qweather.com';

/** Query key of the credential id */
export const PUBLIC_ID_KEY = 'publicid';
/** Query key of the request timestamp (integer Unix seconds) */
export const TIMESTAMP_KEY = 't';

/**
 * Client configuration, fixed at construction
 */
export interface ClientConfig {
  /** Credential id, sent as `publicid` */
  publicId: string;
  /** Shared secret appended to the canonical string before hashing */
  privateKey: string;
  /** Use the subscription host instead of the free-tier host */
  subscription?: boolean;
  /** Override the weather API host */
  apiHost?: string;
  /** Override the GeoAPI host */
  geoApiHost?: string;
  /** Response language, sent as `lang` */
  lang?: string;
  /** Unit system, sent as `unit` */
  unit?: UnitSystem;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Signature digest (default: MD5) */
  digest?: DigestFn;
  /** Clock in milliseconds since the epoch (default: Date.now) */
  now?: () => number;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Request ID for log correlation (default: the enclosing context's, else a new one) */
  requestId?: string;
  /** Overrides the client timeout for this request */
  timeoutMs?: number;
  /** Aborts the HTTP call; an aborted call resolves to a TRANSPORT_ERROR */
  signal?: AbortSignal;
}

/**
 * Signed client for the QWeather REST API
 *
 * The client holds only read-only configuration, so one instance can serve
 * any number of concurrent requests. Each call builds and signs its own
 * parameter map.
 */
export class QWeatherClient {
  private readonly config: Readonly<ClientConfig>;
  private readonly apiHost: string;
  private readonly geoApiHost: string;
  private readonly persistentParams: ParamMap;
  private readonly defaultTimeout: number;
  private readonly digest: DigestFn;
  private readonly now: () => number;

  constructor(config: ClientConfig) {
    this.config = Object.freeze({ ...config });
    this.apiHost = (
      config.apiHost ?? (config.subscription ? WEATHER_API_URL : WEATHER_DEV_API_URL)
    ).replace(/\/$/, '');
    this.geoApiHost = (config.geoApiHost ?? GEO_API_URL).replace(/\/$/, '');
    this.defaultTimeout = config.timeoutMs ?? 10000;
    this.digest = config.digest ?? md5Hex;
    this.now = config.now ?? Date.now;

    this.persistentParams = Object.freeze({
      [PUBLIC_ID_KEY]: config.publicId,
      ...(config.lang ? { lang: config.lang } : {}),
      ...(config.unit ? { unit: config.unit } : {}),
    });

    logger.info('QWeatherClient initialized', {
      apiHost: this.apiHost,
      geoApiHost: this.geoApiHost,
      subscription: Boolean(config.subscription),
      lang: config.lang,
      unit: config.unit,
      defaultTimeout: this.defaultTimeout,
    });
  }

  getApiHost(): string {
    return this.apiHost;
  }

  getGeoApiHost(): string {
    return this.geoApiHost;
  }

  /** Unit system of returned values; the provider defaults to metric */
  getUnit(): UnitSystem {
    return this.config.unit ?? 'm';
  }

  /**
   * Merge request parameters with the client's persistent parameters, add a
   * fresh timestamp and sign the result
   *
   * Persistent parameters and the timestamp win over request parameters of
   * the same name. A `key` credential or stale `sign` is never sent, in any
   * letter case.
   */
  signRequest(params: ParamMap): ParamMap {
    const requested = Object.fromEntries(
      Object.entries(params).filter(([key]) => !isExcludedKey(key))
    );
    const merged: Record<string, string> = {
      ...requested,
      ...this.persistentParams,
      [TIMESTAMP_KEY]: String(Math.floor(this.now() / 1000)),
    };
    return signParams(merged, this.config.privateKey, this.digest);
  }

  /**
   * Call an endpoint and decode its envelope
   *
   * Never rejects: transport failures, provider status codes and payloads
   * that do not match the schema all come back as `{ ok: false, error }`.
   *
   * @param url - Absolute endpoint URL without query string
   * @param params - Endpoint parameters, unencoded
   * @param schema - Schema of the whole response body (envelope and payload)
   */
  async requestApi<S extends z.ZodTypeAny>(
    url: string,
    params: ParamMap,
    schema: S,
    options: RequestOptions = {}
  ): Promise<ApiResult<z.output<S>>> {
    const requestId = options.requestId || getRequestId() || generateRequestId();
    const timeout = options.timeoutMs ?? this.defaultTimeout;
    const query = new URLSearchParams(this.signRequest(params));
    const requestUrl = `${url}?${query.toString()}`;
    const startTime = Date.now();

    logger.debug('QWeather request starting', { requestId, url });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let httpStatus: number;
    let text: string;
    try {
      if (options.signal?.aborted) {
        controller.abort();
      }

      const response = await fetch(requestUrl, {
        method: 'GET',
        headers: { Accept: 'application/json', 'Accept-Encoding': 'gzip' },
        signal: controller.signal,
      });
      httpStatus = response.status;
      text = await response.text();
    } catch (error) {
      const latency = Date.now() - startTime;

      if (error instanceof Error) {
        logger.error('QWeather request failed', {
          requestId,
          url,
          error: error.message,
          latency,
        });

        if (error.name === 'AbortError') {
          const reason = options.signal?.aborted
            ? 'Request aborted by caller'
            : `Request timeout after ${timeout}ms`;
          return failure(handleNetworkError(new Error(reason), requestId));
        }

        return failure(handleNetworkError(error, requestId));
      }

      logger.error('QWeather request failed with unknown error', {
        requestId,
        url,
        error: String(error),
        latency,
      });

      return failure(handleNetworkError(new Error('Unknown error occurred'), requestId));
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }

    const latency = Date.now() - startTime;
    logger.logUpstreamCall(requestUrl, httpStatus, latency, requestId);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return failure(createMalformedBodyError(httpStatus, requestId));
    }

    const result = resolveEnvelope(body, schema);

    logger.info('QWeather request completed', {
      requestId,
      url,
      httpStatus,
      latency,
      outcome: result.ok ? 'success' : result.error.code,
    });

    return result;
  }
}
