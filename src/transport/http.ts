/**
 * HTTP transport for the QWeather MCP server
 * Express + StreamableHTTPServerTransport in stateless mode
 */

import express from 'express';
import type { Server } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';

/**
 * Build the Express app: `/health` and the stateless `/mcp` endpoint
 */
export function createHttpApp(server: McpServer): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http' });
  });

  app.post('/mcp', async (req, res) => {
    // A fresh transport per request: clients may reuse JSON-RPC ids, and a
    // shared transport would route their responses to the wrong connection.
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch((error: unknown) => {
          logger.warn('Failed to close MCP transport', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  return app;
}

/**
 * Start the MCP server with HTTP transport
 */
export async function startHttpServer(config: ServerConfig): Promise<Server> {
  const port = config.mcpPort;
  if (!port) {
    throw new Error('QWEATHER_MCP_PORT must be set for HTTP transport');
  }

  logger.info('Initializing MCP server with HTTP transport', { port });

  const app = createHttpApp(createMcpServer(config));

  return new Promise((resolve, reject) => {
    const listener = app
      .listen(port, () => {
        logger.info('MCP server listening on HTTP transport', {
          port,
          endpoint: `http://localhost:${port}/mcp`,
          health: `http://localhost:${port}/health`,
        });
        resolve(listener);
      })
      .on('error', (error) => {
        logger.error('HTTP server error', { error: error.message });
        reject(error);
      });
  });
}
