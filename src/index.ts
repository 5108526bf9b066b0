#!/usr/bin/env node

/**
 * Facebook Ads MCP Server
 * Entry point: resolves the access token, then serves tools over stdio (default) or SSE.
 *
 *   fb-ads-mcp-server --fb-token TOKEN
 *   fb-ads-mcp-server --transport sse --host 0.0.0.0 --port 8000
 */

import { config as loadDotenv } from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { GraphApiClient } from './api/graph-api-client.js';
import { ConfigurationError } from './api/errors.js';
import { CredentialResolver } from './config/credentials.js';
import { loadSettings } from './config/settings.js';
import { createMcpServer } from './mcp-server.js';
import { startHttpServer } from './server.js';
import type { ToolContext } from './tools/dispatch.js';
import { createLogger } from './utils/logger.js';

// Load environment variables (for development)
if (process.env.NODE_ENV !== 'production') {
  loadDotenv();
}

async function main(): Promise<void> {
  const logger = createLogger({ service: 'fb-ads-mcp' });
  const settings = loadSettings();
  const credentials = CredentialResolver.fromProcess();

  // Fail before any transport is up
  try {
    credentials.resolve();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`Error: ${error.message}\n`);
      process.exit(1);
    }
    throw error;
  }

  const context: ToolContext = {
    api: new GraphApiClient({ credentials, graphUrl: settings.graphUrl, logger }),
    logger
  };

  if (settings.transport === 'sse') {
    startHttpServer(context, settings.host, settings.port);
    return;
  }

  const server = createMcpServer(context);
  await server.connect(new StdioServerTransport());
  logger.info('Facebook Ads MCP server running on stdio', { api_version: settings.apiVersion });
}

main().catch(error => {
  createLogger({ service: 'fb-ads-mcp' }).error('Fatal error starting server', error);
  process.exit(1);
});
