/**
 * Slack Authorization Flow
 *
 * Issues authorization URLs and completes the callback leg of the OAuth
 * authorization-code exchange, binding the resulting token to the MCP session
 * that asked for the URL.
 *
 * Per session the flow moves NotStarted → UrlIssued → CallbackReceived and
 * ends in Bound or Failed. The state token is consumed before the network
 * call, and the credential is bound only after the exchange fully succeeds.
 */

import {
  buildAuthorizationUrl,
  isSlackOAuthConfigured,
  type SlackOAuthSettings,
} from '../config/app-config.js';
import { logger } from '../observability/logger.js';
import type { SessionContext, SessionScope } from '../session/session-context.js';
import type { SessionRegistry } from '../session/session-registry.js';
import {
  ConfigurationError,
  InvalidOrExpiredStateError,
  MissingCodeError,
  MissingStateError,
  ProviderDeniedError,
  SessionUnavailableError,
  TokenExchangeFailedError,
} from './errors.js';
import type { ExchangeCodeForToken, TokenExchangeResult } from './token-exchange.js';

export type FlowState = 'NotStarted' | 'UrlIssued' | 'CallbackReceived' | 'Bound' | 'Failed';

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
}

export interface CallbackResult {
  sessionId: string;
  externalUserId: string;
  teamId?: string;
}

export interface AuthorizationFlowDeps {
  settings: SlackOAuthSettings;
  registry: SessionRegistry;
  context: SessionContext;
  exchangeCodeForToken: ExchangeCodeForToken;
  now?: () => number;
}

function logTransition(sessionId: string | undefined, from: FlowState, to: FlowState, detail?: Record<string, unknown>): void {
  logger.info('OAuth flow transition', { sessionId, from, to, ...detail });
}

export class AuthorizationFlow {
  private readonly now: () => number;

  constructor(private readonly deps: AuthorizationFlowDeps) {
    this.now = deps.now ?? Date.now;
  }

  isConfigured(): boolean {
    return isSlackOAuthConfigured(this.deps.settings);
  }

  /**
   * Authorization URL for `sessionId`, or for the session of the current
   * request when omitted.
   */
  issueUrl(sessionId: string | undefined = this.deps.context.getSessionId()): string {
    const { settings, registry } = this.deps;
    if (!isSlackOAuthConfigured(settings)) {
      throw new ConfigurationError();
    }
    if (!sessionId) {
      throw new SessionUnavailableError();
    }

    const state = registry.generateState(sessionId);
    logTransition(sessionId, 'NotStarted', 'UrlIssued');
    return buildAuthorizationUrl(settings, state);
  }

  /**
   * Validate a provider callback and bind the exchanged token.
   *
   * @param scope - the callback request's scope; the resolved session id is
   *   published into it before the exchange
   * @throws FlowError subclasses, in the order the checks run
   */
  async handleCallback(params: CallbackParams, scope?: SessionScope): Promise<CallbackResult> {
    const { registry, context, settings, exchangeCodeForToken } = this.deps;

    if (params.error) {
      logTransition(undefined, 'UrlIssued', 'Failed', { reason: 'provider_denied', providerError: params.error });
      throw new ProviderDeniedError(params.error);
    }
    if (!params.code) {
      throw new MissingCodeError();
    }
    if (!params.state) {
      logger.warn('OAuth callback without state parameter');
      throw new MissingStateError();
    }
    if (!isSlackOAuthConfigured(settings)) {
      throw new ConfigurationError();
    }

    const sessionId = registry.peekStateOwner(params.state);
    if (!sessionId) {
      logger.error('OAuth callback with unknown or expired state');
      throw new InvalidOrExpiredStateError();
    }

    // A concurrent callback can pass the peek too; only one wins the consume
    if (!registry.validateAndConsumeState(params.state, sessionId)) {
      logger.error('OAuth state redemption failed', { sessionId });
      throw new InvalidOrExpiredStateError();
    }
    logTransition(sessionId, 'UrlIssued', 'CallbackReceived');

    const activeScope = scope ?? context.currentScope();
    activeScope?.bind(sessionId);

    let exchanged: TokenExchangeResult;
    try {
      exchanged = await exchangeCodeForToken(params.code);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logTransition(sessionId, 'CallbackReceived', 'Failed', { reason: 'token_exchange_failed', error: message });
      throw new TokenExchangeFailedError(message);
    }

    const bound = registry.bindCredential(sessionId, {
      accessToken: exchanged.accessToken,
      externalUserId: exchanged.externalUserId,
      scopes: exchanged.scopes,
      teamId: exchanged.teamId,
      obtainedAt: this.now(),
    });
    if (!bound) {
      logTransition(sessionId, 'CallbackReceived', 'Failed', { reason: 'session_ended' });
      throw new SessionUnavailableError('The MCP session ended before authorization completed. Please reconnect and request a new OAuth URL.');
    }
    logTransition(sessionId, 'CallbackReceived', 'Bound', { externalUserId: exchanged.externalUserId });

    return {
      sessionId,
      externalUserId: exchanged.externalUserId,
      teamId: exchanged.teamId,
    };
  }
}
