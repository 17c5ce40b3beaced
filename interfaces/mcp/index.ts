#!/usr/bin/env node
/**
 * dochive MCP server entry point
 *
 * Serves the scraper tools over stdio. Logs go to the log file (and to stderr
 * when DOCHIVE_LOG_TO_CONSOLE is set) since stdout carries the protocol.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from '../../shared/infrastructure/config.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { toError } from '../../shared/domain/errors.js';
import { CrawlerServiceProvider } from '../../services/crawler/infrastructure/CrawlerServiceProvider.js';
import { DochiveMcpServer, createToolHandlers } from './server.js';

const logger = getLogger();

async function main(): Promise<void> {
  const services = await CrawlerServiceProvider.getInstance();
  const server = new DochiveMcpServer(
    { name: config.mcp.name, version: config.mcp.version },
    createToolHandlers(services)
  );

  process.on('SIGINT', () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.logError(toError(error), 'main', 'Failed to close the server');
        process.exit(1);
      }
    );
  });

  await server.connect(new StdioServerTransport());
  logger.info(`dochive MCP server running on stdio with ${services.sites.list().length} sites`, 'main');
}

main().catch((error: unknown) => {
  logger.logError(toError(error), 'main', 'Failed to start dochive MCP server');
  process.exit(1);
});
