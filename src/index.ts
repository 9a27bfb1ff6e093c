#!/usr/bin/env node
/**
 * MTK Reset MCP Server - Main Entry Point
 */

import { startServer } from './server.js';
import { CommandExecutor } from './utils/executor.js';
import * as logger from './utils/logger.js';

// Stop running installs or the erase along with the server
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    const killed = CommandExecutor.killAll();
    logger.error(`Interrupted by user${killed > 0 ? ` (stopped ${killed} running command${killed === 1 ? '' : 's'})` : ''}`);
    process.exit(130);
  });
}

startServer().catch((error) => {
  logger.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
