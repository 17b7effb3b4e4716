/**
 * Slack Token Exchange
 *
 * Trades an authorization code for a user access token at `oauth.v2.access`.
 * The request is form-encoded and bounded by a timeout; Slack reports most
 * failures as HTTP 200 with `ok: false`, so both layers are checked.
 */

import { z } from 'zod';
import { isSlackOAuthConfigured, type SlackOAuthSettings } from '../config/app-config.js';
import { logger } from '../observability/logger.js';

export interface TokenExchangeResult {
  accessToken: string;
  externalUserId: string;
  scopes: string[];
  teamId?: string;
}

export type ExchangeCodeForToken = (code: string) => Promise<TokenExchangeResult>;

export interface TokenExchangeOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Raised for any failed exchange. Messages describe the failure only and
 * never include token material.
 */
export class TokenExchangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenExchangeError';
  }
}

const slackTokenResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  authed_user: z
    .object({
      id: z.string(),
      access_token: z.string().optional(),
      scope: z.string().optional(),
    })
    .optional(),
  team: z.object({ id: z.string() }).nullish(),
});

function splitScopes(scope: string | undefined): string[] {
  return scope ? scope.split(',').map((s) => s.trim()).filter((s) => s.length > 0) : [];
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export function createSlackTokenExchange(
  settings: SlackOAuthSettings,
  options: TokenExchangeOptions,
): ExchangeCodeForToken {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (code: string): Promise<TokenExchangeResult> => {
    if (!isSlackOAuthConfigured(settings)) {
      throw new TokenExchangeError('Slack OAuth client credentials are not configured');
    }

    logger.info('Slack token exchange started', { endpoint: settings.tokenUrl });

    let response: Response;
    try {
      response = await fetchImpl(settings.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: settings.clientId,
          client_secret: settings.clientSecret,
          code,
          redirect_uri: settings.redirectUri,
        }).toString(),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        logger.error('Slack token exchange timed out', { timeoutMs: options.timeoutMs });
        throw new TokenExchangeError(`Token exchange timed out after ${options.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Slack token exchange network error', { error: message });
      throw new TokenExchangeError(`Network error contacting Slack: ${message}`);
    }

    if (!response.ok) {
      logger.error('Slack token exchange failed', {
        status: response.status,
        statusText: response.statusText,
      });
      throw new TokenExchangeError(`Token exchange failed (${response.status})`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TokenExchangeError('Token exchange failed: response was not JSON');
    }

    const parsed = slackTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error('Slack token exchange returned an unexpected payload', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      throw new TokenExchangeError('Token exchange failed: unexpected response from Slack');
    }

    const data = parsed.data;
    if (!data.ok) {
      logger.error('Slack rejected the authorization code', { error: data.error });
      throw new TokenExchangeError(`Slack error: ${data.error ?? 'unknown_error'}`);
    }

    // Only the user token; a top-level access_token is a bot token
    const accessToken = data.authed_user?.access_token;
    const externalUserId = data.authed_user?.id;
    if (!accessToken || !externalUserId) {
      throw new TokenExchangeError('Token exchange failed: no user token in response');
    }

    logger.info('Slack token exchange completed', {
      externalUserId,
      teamId: data.team?.id,
    });

    return {
      accessToken,
      externalUserId,
      scopes: splitScopes(data.authed_user?.scope),
      teamId: data.team?.id,
    };
  };
}
