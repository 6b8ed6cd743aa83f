/**
 * Status branching for decoded QWeather response bodies
 */

import type { z } from 'zod';
import {
  createDecodeError,
  createProviderError,
  failure,
  formatIssues,
} from './error-handler.js';
import type { ApiResult } from './types.js';

/** Status discriminator value the provider uses for success */
export const SUCCESS_CODE = '200';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the status discriminator. Numeric codes are accepted as their
 * decimal string; absent or null means the endpoint defines none.
 */
export function readStatusCode(body: Record<string, unknown>): string | undefined {
  const code = body.code;
  if (typeof code === 'string') {
    return code;
  }
  if (typeof code === 'number') {
    return String(code);
  }
  return undefined;
}

/**
 * Error object used by endpoints without a `code` field, e.g.
 * `{ "error": { "status": 400, "type": "...", "title": "...", "detail": "..." } }`
 */
function readErrorObject(
  body: Record<string, unknown>
): { status: string; title?: string; detail?: string } | undefined {
  const error = body.error;
  if (!isRecord(error)) {
    return undefined;
  }

  const status = error.status;
  if (typeof status !== 'string' && typeof status !== 'number') {
    return undefined;
  }

  return {
    status: String(status),
    title: typeof error.title === 'string' ? error.title : undefined,
    detail: typeof error.detail === 'string' ? error.detail : undefined,
  };
}

/**
 * Route a parsed JSON body to a typed success or a typed error
 *
 * - code "200", or no code at all: decode the whole body with the schema;
 *   a schema mismatch is a DECODE_ERROR value, never an exception
 * - any other code: PROVIDER_ERROR carrying the code as given
 */
export function resolveEnvelope<S extends z.ZodTypeAny>(
  body: unknown,
  schema: S
): ApiResult<z.output<S>> {
  if (!isRecord(body)) {
    return failure(createDecodeError(['expected a JSON object at the top level']));
  }

  const code = readStatusCode(body);

  if (code === undefined) {
    const error = readErrorObject(body);
    if (error) {
      const { status, ...extra } = error;
      return failure(createProviderError(status, extra));
    }
  } else if (code !== SUCCESS_CODE) {
    return failure(createProviderError(code));
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return failure(createDecodeError(formatIssues(parsed.error.issues)));
  }

  return { ok: true, data: parsed.data };
}
