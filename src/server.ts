/**
 * Facebook Ads MCP HTTP/SSE server
 * For remote deployment; one MCP server instance per SSE session
 */

import type { Server as HttpServer } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { createMcpServer } from './mcp-server.js';
import type { ToolContext } from './tools/dispatch.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

export function createHttpApp(context: ToolContext): Express {
  const { logger } = context;
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Active SSE transports by session ID
  const transports = new Map<string, SSEServerTransport>();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Open an SSE stream; the client posts its messages to MESSAGES_PATH?sessionId=...
  app.get(SSE_PATH, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    transports.set(transport.sessionId, transport);

    transport.onclose = () => {
      logger.info('SSE connection closed', { sessionId: transport.sessionId });
      transports.delete(transport.sessionId);
    };

    try {
      await createMcpServer(context).connect(transport);
      logger.info('SSE connection established', { sessionId: transport.sessionId });
    } catch (error) {
      logger.error('Failed to establish SSE connection', error);
      transports.delete(transport.sessionId);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  app.post(MESSAGES_PATH, async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;

    if (!sessionId) {
      res.status(400).json({ error: 'Missing sessionId' });
      return;
    }

    const transport = transports.get(sessionId);

    if (!transport) {
      res.status(404).json({ error: 'Session not found. Session may have expired.' });
      return;
    }

    try {
      // express.json() has already consumed the stream
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      logger.error('Error handling POST message', error, { sessionId });
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  return app;
}

export function startHttpServer(context: ToolContext, host: string, port: number): HttpServer {
  const { logger } = context;
  const app = createHttpApp(context);

  return app.listen(port, host, () => {
    logger.info(`Facebook Ads MCP server running in SSE mode on ${host}:${port}`);
    logger.info(`SSE endpoint: http://${host}:${port}${SSE_PATH}`);
  });
}
