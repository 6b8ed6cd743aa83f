/**
 * Error construction for the QWeather client
 */

import type { z } from 'zod';
import type { ApiResult, ErrorCode, QWeatherError } from './types.js';
import { logger } from './logger.js';

/**
 * Create a structured QWeather error
 *
 * Only transport failures are flagged retryable; provider codes are passed
 * through untouched and carry no retry hint.
 */
export function createQWeatherError(
  code: ErrorCode,
  message: string,
  details?: QWeatherError['details']
): QWeatherError {
  return {
    code,
    message,
    retryable: code === 'TRANSPORT_ERROR',
    details,
  };
}

/**
 * Wrap a failure result
 */
export function failure<T = never>(error: QWeatherError): ApiResult<T> {
  return { ok: false, error };
}

/**
 * Handle network errors (connection refused, DNS, TLS, timeout, abort)
 */
export function handleNetworkError(
  error: Error,
  requestId?: string
): QWeatherError {
  logger.error('Network error calling QWeather API', {
    error: error.message,
    requestId,
  });

  return createQWeatherError(
    'TRANSPORT_ERROR',
    `Unable to reach QWeather API: ${error.message}`,
    {
      requestId,
      networkError: error.message,
    }
  );
}

/**
 * A response body that could not be parsed as JSON
 */
export function createMalformedBodyError(
  httpStatus: number,
  requestId?: string
): QWeatherError {
  logger.error('QWeather API returned a non-JSON body', {
    httpStatus,
    requestId,
  });

  return createQWeatherError(
    'TRANSPORT_ERROR',
    'QWeather API returned a response body that is not valid JSON.',
    { httpStatus, requestId }
  );
}

/**
 * A non-success status discriminator. The code is kept exactly as received.
 */
export function createProviderError(
  providerCode: string,
  extra?: Record<string, unknown>
): QWeatherError {
  logger.warn('QWeather API returned an error status', {
    providerCode,
    ...extra,
  });

  return createQWeatherError(
    'PROVIDER_ERROR',
    `QWeather API returned status code ${providerCode}`,
    { providerCode, ...extra }
  );
}

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * The body parsed and the status was success, but the payload did not
 * match its schema
 */
export function createDecodeError(issues: string[]): QWeatherError {
  logger.error('Failed to decode QWeather response', { issues });

  return createQWeatherError('DECODE_ERROR', 'decode failed', { issues });
}

/**
 * Caller arguments rejected before any request is made
 */
export function createInvalidInputError(issues: string[]): QWeatherError {
  return createQWeatherError(
    'INVALID_INPUT',
    `Invalid input parameters: ${issues.join('; ')}`,
    { issues }
  );
}

/**
 * Validate endpoint arguments with a zod schema
 */
export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ApiResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }

  const issues = formatIssues(parsed.error.issues);
  logger.debug('Rejected endpoint input', { issues });
  return failure(createInvalidInputError(issues));
}
