/**
 * Authorization Flow Tests
 *
 * Drives URL issuance and the callback leg against a real registry and
 * session context, with the Slack token exchange stubbed.
 */

import { SessionContext, SessionScope } from '../session/session-context.js';
import { SessionRegistry } from '../session/session-registry.js';
import { AuthorizationFlow } from './authorization-flow.js';
import {
  ConfigurationError,
  InvalidOrExpiredStateError,
  MissingCodeError,
  MissingStateError,
  ProviderDeniedError,
  SessionUnavailableError,
  TokenExchangeFailedError,
} from './errors.js';
import { TokenExchangeError, type TokenExchangeResult } from './token-exchange.js';
import { configuredSettings, stateFromUrl, unconfiguredSettings } from './test-fixtures.js';
import type { SlackOAuthSettings } from '../config/app-config.js';

const exchanged: TokenExchangeResult = {
  accessToken: 'T1',
  externalUserId: 'U42',
  scopes: ['channels:read', 'search:read'],
  teamId: 'T-TEAM',
};

describe('AuthorizationFlow', () => {
  let registry: SessionRegistry;
  let context: SessionContext;
  let exchangeCodeForToken: jest.Mock<Promise<TokenExchangeResult>, [string]>;

  function makeFlow(settings: SlackOAuthSettings = configuredSettings): AuthorizationFlow {
    return new AuthorizationFlow({
      settings,
      registry,
      context,
      exchangeCodeForToken,
      now: () => 42_000,
    });
  }

  beforeEach(() => {
    registry = new SessionRegistry({ stateTtlMs: 600_000, sessionIdleMs: 3_600_000 });
    context = new SessionContext();
    exchangeCodeForToken = jest.fn((_code: string) => Promise.resolve(exchanged));
  });

  describe('issueUrl', () => {
    it('should issue a Slack URL carrying a state owned by the session', () => {
      const url = new URL(makeFlow().issueUrl('sess-1'));

      expect(`${url.origin}${url.pathname}`).toBe('https://slack.com/oauth/v2/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('user_scope')).toBe('channels:read,search:read');
      expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8001/oauth2callback');
      expect(registry.peekStateOwner(stateFromUrl(url.toString()))).toBe('sess-1');
    });

    it('should fall back to the session of the current request', () => {
      const flow = makeFlow();

      const url = context.run(new SessionScope('sess-2'), () => flow.issueUrl());

      expect(registry.peekStateOwner(stateFromUrl(url))).toBe('sess-2');
    });

    it('should fail with ConfigurationError and leave the registry untouched when unconfigured', () => {
      expect(() => makeFlow(unconfiguredSettings).issueUrl('sess-1')).toThrow(ConfigurationError);
      expect(registry.stats()).toEqual({ sessions: 0, boundSessions: 0, pendingStates: 0 });
    });

    it('should fail with SessionUnavailableError when no session resolves', () => {
      expect(() => makeFlow().issueUrl()).toThrow(SessionUnavailableError);
    });
  });

  describe('handleCallback', () => {
    it('should bind the exchanged token to the session that asked for the URL', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));
      const scope = new SessionScope();

      const result = await flow.handleCallback({ code: 'xyz', state }, scope);

      expect(result).toEqual({ sessionId: 'sess-1', externalUserId: 'U42', teamId: 'T-TEAM' });
      expect(exchangeCodeForToken).toHaveBeenCalledWith('xyz');
      expect(registry.getCredential('sess-1')).toEqual({
        accessToken: 'T1',
        externalUserId: 'U42',
        scopes: ['channels:read', 'search:read'],
        teamId: 'T-TEAM',
        obtainedAt: 42_000,
      });
      expect(scope.getSessionId()).toBe('sess-1');
    });

    it('should publish the session into the ambient scope when none is passed', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));
      let seenDuringExchange: string | undefined;
      exchangeCodeForToken.mockImplementation(async () => {
        seenDuringExchange = context.getSessionId();
        return exchanged;
      });

      await context.run(new SessionScope(), () => flow.handleCallback({ code: 'xyz', state }));

      expect(seenDuringExchange).toBe('sess-1');
    });

    it('should reject a provider error without consuming state or calling Slack', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));

      await expect(flow.handleCallback({ error: 'access_denied', state })).rejects.toThrow(ProviderDeniedError);

      expect(exchangeCodeForToken).not.toHaveBeenCalled();
      expect(registry.peekStateOwner(state)).toBe('sess-1');
    });

    it('should reject a missing code', async () => {
      await expect(makeFlow().handleCallback({ state: 'abc' })).rejects.toThrow(MissingCodeError);
    });

    it('should reject a missing state', async () => {
      await expect(makeFlow().handleCallback({ code: 'xyz' })).rejects.toThrow(MissingStateError);
    });

    it('should reject an unknown state and leave the registry unchanged', async () => {
      const flow = makeFlow();
      flow.issueUrl('sess-1');
      const before = registry.stats();

      await expect(flow.handleCallback({ code: 'xyz', state: 'unknown' })).rejects.toThrow(InvalidOrExpiredStateError);

      expect(registry.stats()).toEqual(before);
      expect(exchangeCodeForToken).not.toHaveBeenCalled();
    });

    it('should reject the callback when the server lost its client credentials', async () => {
      await expect(
        makeFlow(unconfiguredSettings).handleCallback({ code: 'xyz', state: 'abc' }),
      ).rejects.toThrow(ConfigurationError);
    });

    it('should report a failed exchange, leave the session unbound and burn the state', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));
      exchangeCodeForToken.mockRejectedValue(new TokenExchangeError('Slack error: invalid_code'));

      await expect(flow.handleCallback({ code: 'xyz', state })).rejects.toThrow(
        new TokenExchangeFailedError('Slack error: invalid_code'),
      );

      expect(registry.getCredential('sess-1')).toBeUndefined();
      await expect(flow.handleCallback({ code: 'xyz', state })).rejects.toThrow(InvalidOrExpiredStateError);
    });

    it('should not bind a token to a session removed during the exchange', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));
      let finishExchange: (result: TokenExchangeResult) => void = () => undefined;
      exchangeCodeForToken.mockImplementation(
        () =>
          new Promise<TokenExchangeResult>((resolve) => {
            finishExchange = resolve;
          }),
      );

      const pending = flow.handleCallback({ code: 'xyz', state });
      registry.removeSession('sess-1');
      finishExchange(exchanged);

      await expect(pending).rejects.toThrow(SessionUnavailableError);
      expect(registry.getCredential('sess-1')).toBeUndefined();
      expect(registry.stats()).toEqual({ sessions: 0, boundSessions: 0, pendingStates: 0 });
    });

    it('should refuse to replay a redeemed state', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));

      await flow.handleCallback({ code: 'xyz', state });

      await expect(flow.handleCallback({ code: 'xyz', state })).rejects.toThrow(InvalidOrExpiredStateError);
      expect(exchangeCodeForToken).toHaveBeenCalledTimes(1);
    });

    it('should let only one of two racing callbacks exchange the code', async () => {
      const flow = makeFlow();
      const state = stateFromUrl(flow.issueUrl('sess-1'));

      const results = await Promise.allSettled([
        flow.handleCallback({ code: 'xyz', state }),
        flow.handleCallback({ code: 'xyz', state }),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
      expect(exchangeCodeForToken).toHaveBeenCalledTimes(1);
    });
  });
});
