/**
 * MCP server instance shared by the stdio and SSE transports
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { TOOLS } from './tools/definitions.js';
import { handleToolCall, type ToolContext } from './tools/dispatch.js';

export const SERVER_NAME = 'fb-ads-mcp-server';
export const SERVER_VERSION = '1.0.0';

export function createMcpServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS
  }));

  server.setRequestHandler(CallToolRequestSchema, async request =>
    handleToolCall(request.params.name, request.params.arguments ?? {}, context)
  );

  return server;
}
