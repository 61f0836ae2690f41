#!/usr/bin/env node

/**
 * Anki Card MCP Server
 *
 * MCP server for creating and inspecting Anki flashcards via AnkiConnect.
 * Communicates over STDIO transport.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { AutoEndpointResolver } from './lib/endpoint-resolver.js';
import { AnkiClient } from './lib/anki-client.js';
import { createServer } from './server.js';

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger(config.verbose);

  // Resolved once; every tool call reuses it
  const endpoint = await new AutoEndpointResolver(config, { logger }).resolve();
  const client = new AnkiClient({ endpoint, apiKey: config.apiKey });

  const server = createServer({ client, logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Anki Card MCP server running');
  logger.info(`AnkiConnect endpoint: ${endpoint}`);
  if (config.apiKey) {
    logger.debug('AnkiConnect API key configured');
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
