#!/usr/bin/env node

/**
 * Conversation Assistant MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('main');

async function main() {
  const config = getConfig();
  printConfigInfo(config);

  const mcpServer = new McpServer(config);
  await mcpServer.start();
  mcpServer.printStats();

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('signal_received', { signal });

    try {
      await mcpServer.shutdown();
    } catch (error) {
      log.error('shutdown_failed', { error });
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT', 0));
  process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

  process.on('uncaughtException', (error) => {
    log.error('uncaught_exception', { error });
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    log.error('unhandled_rejection', { reason });
    void shutdown('UNHANDLED_REJECTION', 1);
  });
}

main().catch((error: unknown) => {
  log.error('fatal_error', { error });
  process.exit(1);
});
