#!/usr/bin/env node
/**
 * QWeather MCP Server
 * Entry point for the Model Context Protocol server
 */

import { getConfig } from './config/env.js';
import { logger } from './domain/logger.js';
import { startStdioServer } from './transport/stdio.js';
import { startHttpServer } from './transport/http.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();

    logger.setLevel(config.logLevel);

    logger.info('Starting QWeather MCP Server', {
      version: config.serverVersion,
      logLevel: config.logLevel,
    });

    if (config.mcpPort) {
      logger.info('Using HTTP transport', { port: config.mcpPort });
      const httpServer = await startHttpServer(config);

      const shutdown = () => {
        logger.info('Shutdown signal received');
        httpServer.close(() => process.exit(0));
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    } else {
      logger.info('Using stdio transport');
      const server = await startStdioServer(config);

      const shutdown = async () => {
        logger.info('Shutdown signal received, closing server...');
        try {
          await server.close();
          logger.info('Server closed successfully');
          process.exit(0);
        } catch (error) {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      };

      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    }

    process.on('uncaughtException', (error: Error) => {
      logger.logError(error, { context: 'uncaughtException' });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled promise rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
      });
      process.exit(1);
    });

    logger.info('QWeather MCP Server is ready');
  } catch (error) {
    if (error instanceof Error) {
      logger.logError(error, { context: 'startup' });
    } else {
      logger.error('Unknown error during startup', { error: String(error) });
    }
    process.exit(1);
  }
}

void main();
