/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ApiResult, QWeatherError } from './types.js';

/**
 * Build a successful tool response with structured content and a text
 * summary
 */
export function buildToolResponse(
  structuredContent: Record<string, unknown>,
  textSummary: string
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent,
  };
}

/**
 * Build an error tool response
 *
 * Provider errors mention the provider's status code in the text so the
 * model can look it up.
 */
export function buildErrorResponse(error: QWeatherError): CallToolResult {
  const providerCode = error.details?.providerCode;
  const textSummary =
    error.code === 'PROVIDER_ERROR' && providerCode
      ? `${error.message}. See https://dev.qweather.com/en/docs/resource/status-code/ for code ${providerCode}.`
      : error.message;

  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent: {
      error,
    },
    isError: true,
  };
}

/**
 * Turn an endpoint result into a tool response
 */
export function buildResultResponse<T>(
  result: ApiResult<T>,
  render: (data: T) => { structuredContent: Record<string, unknown>; summary: string }
): CallToolResult {
  if (!result.ok) {
    return buildErrorResponse(result.error);
  }

  const { structuredContent, summary } = render(result.data);
  return buildToolResponse(structuredContent, summary);
}
