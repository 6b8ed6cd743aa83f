/**
 * Tool wrapper
 * Gives every tool call a request id, start/end logging and latency
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createQWeatherError } from './error-handler.js';
import { isRecord } from './envelope.js';
import { logger } from './logger.js';
import { generateRequestId, runWithContext } from './request-context.js';
import { buildErrorResponse } from './response-builder.js';

/**
 * Tool handler function type
 */
export type ToolHandler = (...args: unknown[]) => Promise<CallToolResult>;

/**
 * Wrap a tool handler
 *
 * The handler runs inside a request context, so QWeather calls it makes log
 * under the same request id. A handler that throws produces an
 * INTERNAL_ERROR tool response instead of a protocol error.
 */
export function wrapTool(toolName: string, handler: ToolHandler): ToolHandler {
  return async (...args: unknown[]): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    return runWithContext({ requestId, toolName }, async () => {
      logger.logToolStart(toolName, args[0], requestId);

      try {
        const result = await handler(...args);
        const latencyMs = Date.now() - startTime;
        const outcome = result.isError ? 'error' : 'success';

        logger.logToolEnd(
          toolName,
          latencyMs,
          outcome,
          requestId,
          result.isError ? extractErrorCode(result) : undefined
        );

        return result;
      } catch (error) {
        const latencyMs = Date.now() - startTime;
        const message = error instanceof Error ? error.message : String(error);

        logger.logToolEnd(toolName, latencyMs, 'error', requestId, 'INTERNAL_ERROR');
        if (error instanceof Error) {
          logger.logError(error, { requestId, toolName, context: 'tool_wrapper' });
        }

        return buildErrorResponse(
          createQWeatherError('INTERNAL_ERROR', `Tool ${toolName} failed unexpectedly.`, {
            requestId,
            error: message,
          })
        );
      }
    });
  };
}

/**
 * Error code from the structured content of an error response
 */
function extractErrorCode(result: CallToolResult): string | undefined {
  const error = result.structuredContent?.error;
  if (isRecord(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
