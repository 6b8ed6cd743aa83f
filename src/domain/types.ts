/**
 * Common types for the QWeather client
 */

/**
 * Error codes surfaced by the client and the MCP tools
 */
export type ErrorCode =
  | 'TRANSPORT_ERROR'
  | 'PROVIDER_ERROR'
  | 'DECODE_ERROR'
  | 'INVALID_INPUT'
  | 'INTERNAL_ERROR';

/**
 * Structured error value. Network, provider and payload failures are
 * returned as this object instead of being thrown.
 */
export interface QWeatherError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: {
    /** Status discriminator exactly as the provider sent it */
    providerCode?: string;
    requestId?: string;
    httpStatus?: number;
    issues?: string[];
    [key: string]: unknown;
  };
}

/**
 * Outcome of every endpoint call. A response is wholly success or wholly error.
 */
export type ApiResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: QWeatherError };

/**
 * Query parameters before encoding. Values are raw strings; URL encoding
 * happens once, when the request URL is built.
 */
export type ParamMap = Readonly<Record<string, string>>;

/**
 * Measurement unit system accepted by the provider (`m` metric, `i` imperial)
 */
export type UnitSystem = 'm' | 'i';

/**
 * Source metadata included in every tool response
 */
export interface SourceMetadata {
  provider: string;
  product: string;
  sources: string[];
  license: string[];
  updateTime?: string;
  fxLink?: string;
}
