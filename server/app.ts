/**
 * Express application wiring
 *
 * Builds the registry, session context, authorization flow and MCP service
 * from a loaded config and mounts them on an Express app. Nothing here
 * listens on a port; see server.ts.
 */

import * as Sentry from '@sentry/node';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { AppConfig } from './config/app-config.js';
import { createMcpService, type McpService } from './mcp-service.js';
import { logger } from './observability/logger.js';
import { AuthorizationFlow } from './slack-oauth/authorization-flow.js';
import { makeOAuthCallback } from './slack-oauth/callback-route.js';
import { createSlackTokenExchange } from './slack-oauth/token-exchange.js';
import { createRequestBindingMiddleware, SESSION_ID_HEADER } from './session/request-binding-middleware.js';
import { SessionContext } from './session/session-context.js';
import { SessionRegistry } from './session/session-registry.js';

export interface AppBundle {
  app: Express;
  registry: SessionRegistry;
  context: SessionContext;
  flow: AuthorizationFlow;
  mcpService: McpService;
}

export function createApp(config: AppConfig, version: string): AppBundle {
  const registry = new SessionRegistry({
    stateTtlMs: config.stateTtlMs,
    sessionIdleMs: config.sessionIdleMs,
  });
  const context = new SessionContext();
  const flow = new AuthorizationFlow({
    settings: config.slack,
    registry,
    context,
    exchangeCodeForToken: createSlackTokenExchange(config.slack, {
      timeoutMs: config.tokenExchangeTimeoutMs,
    }),
  });
  const mcpService = createMcpService({ registry, context, flow, version });

  const app = express();
  app.set('trust proxy', 1);

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['Content-Type', SESSION_ID_HEADER, 'Authorization', 'mcp-protocol-version', 'last-event-id'],
    exposedHeaders: [SESSION_ID_HEADER],
    maxAge: 86400,
  }));

  app.use(morgan('common', {
    stream: {
      write: (message: string) => logger.info(message.trim()),
    },
  }));

  app.use(express.json());
  app.use(createRequestBindingMiddleware({ context, registry }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      oauthConfigured: flow.isConfigured(),
      mcpSessions: mcpService.activeSessionCount(),
      ...registry.stats(),
    });
  });

  app.get('/oauth2callback', makeOAuthCallback(flow));

  app.post('/mcp', (req: Request, res: Response, next: NextFunction) => {
    mcpService.handleMcpPost(req, res).catch(next);
  });
  app.get('/mcp', (req: Request, res: Response, next: NextFunction) => {
    mcpService.handleSessionRequest(req, res).catch(next);
  });
  app.delete('/mcp', (req: Request, res: Response, next: NextFunction) => {
    mcpService.handleSessionRequest(req, res).catch(next);
  });

  Sentry.setupExpressErrorHandler(app);

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled request error', { method: req.method, path: req.path, error: err.message });
    if (res.headersSent) {
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, registry, context, flow, mcpService };
}
