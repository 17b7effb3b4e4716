/**
 * Express middleware that establishes which MCP session a request belongs to.
 *
 * It does no authentication. It resolves the session id sent by the MCP
 * client, publishes it for the rest of the request and clears it once the
 * response is done.
 *
 * Mount it after the body parsers: AsyncLocalStorage does not follow the
 * stream callbacks they resume from.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { SessionScope, type SessionContext } from './session-context.js';
import type { SessionRegistry } from './session-registry.js';

export const SESSION_ID_HEADER = 'mcp-session-id';

export interface RequestBindingOptions {
  context: SessionContext;
  registry: SessionRegistry;
  resolveSessionId?: (req: Request) => string | undefined;
}

export function resolveSessionIdFromHeader(req: Request): string | undefined {
  const raw = req.headers[SESSION_ID_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * The scope the binding middleware attached to this response, if any
 */
export function getRequestScope(res: Response): SessionScope | undefined {
  const scope: unknown = res.locals.sessionScope;
  return scope instanceof SessionScope ? scope : undefined;
}

export function createRequestBindingMiddleware(options: RequestBindingOptions): RequestHandler {
  const { context, registry } = options;
  const resolveSessionId = options.resolveSessionId ?? resolveSessionIdFromHeader;

  return (req: Request, res: Response, next: NextFunction): void => {
    const sessionId = resolveSessionId(req);
    const scope = new SessionScope(sessionId);
    res.locals.sessionScope = scope;

    if (sessionId) {
      registry.touch(sessionId);
    }

    const release = () => context.clearSession(scope);
    res.once('finish', release);
    res.once('close', release);

    context.run(scope, () => next());
  };
}
