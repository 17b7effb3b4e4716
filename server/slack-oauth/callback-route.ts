/**
 * OAuth Callback Endpoint Factory
 *
 * Handles the browser redirect back from Slack:
 *   GET /oauth2callback?code=&state=&error=
 *
 * The callback arrives on a fresh browser request with no MCP session header;
 * the session is resolved from the state token and published into this
 * request's scope by the authorization flow.
 *
 * Usage:
 *   app.get('/oauth2callback', makeOAuthCallback(flow));
 */

import type { Request, Response } from 'express';
import { logger } from '../observability/logger.js';
import { getRequestScope } from '../session/request-binding-middleware.js';
import type { AuthorizationFlow, CallbackParams } from './authorization-flow.js';
import { FlowError } from './errors.js';
import { renderFlowErrorPage, renderSuccessPage, renderUnexpectedErrorPage } from './callback-pages.js';

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function extractCallbackParams(req: Request): CallbackParams {
  return {
    code: queryParam(req, 'code'),
    state: queryParam(req, 'state'),
    error: queryParam(req, 'error'),
  };
}

export function makeOAuthCallback(flow: AuthorizationFlow) {
  return async (req: Request, res: Response): Promise<void> => {
    const params = extractCallbackParams(req);
    logger.info('OAuth callback received', {
      hasCode: !!params.code,
      hasState: !!params.state,
      error: params.error,
    });

    try {
      const result = await flow.handleCallback(params, getRequestScope(res));
      res.status(200).type('html').send(renderSuccessPage(result.externalUserId));
    } catch (error) {
      if (error instanceof FlowError) {
        res.status(error.httpStatus).type('html').send(renderFlowErrorPage(error));
        return;
      }

      logger.error('Unexpected error in OAuth callback', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      res.status(500).type('html').send(renderUnexpectedErrorPage());
    }
  };
}
