/**
 * MCP Service Module
 *
 * HTTP transport layer between Express and the per-session MCP servers.
 *
 * - handleMcpPost(): initialize requests create a transport, an MCP server and
 *   a registry session; later requests are routed by `mcp-session-id`
 * - handleSessionRequest(): GET (SSE stream) and DELETE on an existing session
 * - startReaper(): periodic sweep of expired state tokens and idle sessions,
 *   closing the transports of the sessions it removes
 */

import type { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpServer } from './mcp-core/server-factory.js';
import { logger } from './observability/logger.js';
import type { SlackToolDeps } from './providers/slack/types.js';
import { resolveSessionIdFromHeader } from './session/request-binding-middleware.js';

interface SessionData {
  transport: StreamableHTTPServerTransport;
  mcpServer: McpServer;
}

export interface McpServiceOptions extends SlackToolDeps {
  version: string;
}

export interface McpService {
  handleMcpPost(req: Request, res: Response): Promise<void>;
  handleSessionRequest(req: Request, res: Response): Promise<void>;
  startReaper(intervalMs: number): () => void;
  closeAll(): Promise<void>;
  activeSessionCount(): number;
}

function isInitializeRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

function sendBadSession(res: Response): void {
  res.status(400).json({
    jsonrpc: '2.0',
    error: {
      code: -32000,
      message: 'Bad Request: No valid session ID provided',
    },
    id: null,
  });
}

export function createMcpService(options: McpServiceOptions): McpService {
  const { registry, context, version } = options;
  const sessions = new Map<string, SessionData>();

  function closeTransport(sessionId: string, session: SessionData): void {
    session.transport.close().catch((error: unknown) => {
      logger.warn('Transport close failed', {
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async function createSession(): Promise<StreamableHTTPServerTransport> {
    const mcpServer = createMcpServer(options, version);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId: string) => {
        sessions.set(sessionId, { transport, mcpServer });
        registry.createOrGet(sessionId);
        context.bindSessionForRequest(sessionId);
        logger.info('MCP session initialized', { sessionId, activeSessions: sessions.size });
      },
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        sessions.delete(sessionId);
        registry.removeSession(sessionId);
        logger.info('MCP session closed', { sessionId, activeSessions: sessions.size });
      }
    };

    await mcpServer.connect(transport);
    return transport;
  }

  async function handleMcpPost(req: Request, res: Response): Promise<void> {
    const sessionId = resolveSessionIdFromHeader(req);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let transport: StreamableHTTPServerTransport;
    if (existing) {
      transport = existing.transport;
    } else if (!sessionId && isInitializeRequest(req.body)) {
      transport = await createSession();
    } else {
      logger.warn('Rejected MCP request without a valid session', { sessionId });
      sendBadSession(res);
      return;
    }

    await transport.handleRequest(req, res, req.body);
  }

  async function handleSessionRequest(req: Request, res: Response): Promise<void> {
    const sessionId = resolveSessionIdFromHeader(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!session) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }

    await session.transport.handleRequest(req, res);
  }

  function reap(): void {
    const { removedSessions } = registry.sweepExpired();
    for (const sessionId of removedSessions) {
      const session = sessions.get(sessionId);
      if (session) {
        logger.info('Reaping idle MCP session', { sessionId });
        sessions.delete(sessionId);
        closeTransport(sessionId, session);
      }
    }
  }

  function startReaper(intervalMs: number): () => void {
    const timer = setInterval(reap, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  async function closeAll(): Promise<void> {
    const open = [...sessions.values()];
    sessions.clear();
    await Promise.allSettled(open.map((session) => session.transport.close()));
  }

  return {
    handleMcpPost,
    handleSessionRequest,
    startReaper,
    closeAll,
    activeSessionCount: () => sessions.size,
  };
}
