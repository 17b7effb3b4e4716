/**
 * Session Registry
 *
 * Single entry point over the credential store and the OAuth state registry.
 * Outer layers (HTTP routes, MCP tools) only ever talk to this class; the maps
 * behind it are private.
 *
 * Every method runs to completion without awaiting, so each check-then-act
 * sequence is one critical section on the event loop. In particular the
 * lookup, expiry check, owner check and delete of a state token cannot
 * interleave with another redemption of the same token.
 */

import { logger, getTokenLogInfo } from '../observability/logger.js';
import { CredentialStore, type BoundCredential, type Session } from './credential-store.js';
import { OAuthStateRegistry } from './oauth-state-registry.js';

export type { BoundCredential, Session };

export interface SessionRegistryOptions {
  stateTtlMs: number;
  sessionIdleMs: number;
  now?: () => number;
}

export interface SweepResult {
  expiredStates: number;
  removedSessions: string[];
}

export interface RegistryStats {
  sessions: number;
  boundSessions: number;
  pendingStates: number;
}

export class SessionRegistry {
  private readonly credentials = new CredentialStore();
  private readonly states: OAuthStateRegistry;
  private readonly sessionIdleMs: number;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions) {
    this.states = new OAuthStateRegistry(options.stateTtlMs);
    this.sessionIdleMs = options.sessionIdleMs;
    this.now = options.now ?? Date.now;
  }

  createOrGet(sessionId: string): Session {
    const { session, created } = this.credentials.ensure(sessionId, this.now());
    if (created) {
      logger.info('Session created', { sessionId });
    }
    return session;
  }

  /** Record activity; returns false for unknown sessions */
  touch(sessionId: string): boolean {
    return this.credentials.touch(sessionId, this.now());
  }

  /**
   * Issue a one-time state token for `sessionId`, creating the session if the
   * URL request arrives before anything else has.
   */
  generateState(sessionId: string): string {
    const now = this.now();
    this.states.sweep(now);
    this.credentials.ensure(sessionId, now);
    const state = this.states.issue(sessionId, now);

    logger.info('Issued OAuth state', {
      sessionId,
      pendingStates: this.states.size,
    });
    return state;
  }

  /** Session a live state token claims, without consuming it */
  peekStateOwner(state: string): string | undefined {
    return this.states.peekOwner(state, this.now());
  }

  validateAndConsumeState(state: string, expectedSessionId: string): boolean {
    const result = this.states.consume(state, expectedSessionId, this.now());
    if (!result.valid) {
      logger.warn('Rejected OAuth state', { expectedSessionId, reason: result.reason });
    }
    return result.valid;
  }

  /**
   * Bind `credential` to a live session. Returns false, binding nothing, when
   * the session was removed or swept in the meantime.
   */
  bindCredential(sessionId: string, credential: BoundCredential): boolean {
    const replaced = this.credentials.getCredential(sessionId) !== undefined;
    if (!this.credentials.setCredential(sessionId, credential, this.now())) {
      logger.warn('Refused to bind credential to a missing session', { sessionId });
      return false;
    }

    logger.info('Bound credential to session', {
      sessionId,
      externalUserId: credential.externalUserId,
      teamId: credential.teamId,
      scopes: credential.scopes,
      replaced,
      ...getTokenLogInfo(credential.accessToken, 'accessToken'),
    });
    return true;
  }

  unbindCredential(sessionId: string): boolean {
    const removed = this.credentials.clearCredential(sessionId, this.now());
    if (removed) {
      logger.info('Unbound credential from session', { sessionId });
    }
    return removed;
  }

  getCredential(sessionId: string): BoundCredential | undefined {
    return this.credentials.getCredential(sessionId);
  }

  /** Tear down a session and any state tokens it still owns */
  removeSession(sessionId: string): boolean {
    const droppedStates = this.states.dropForSession(sessionId);
    const removed = this.credentials.delete(sessionId);
    if (removed) {
      logger.info('Session removed', { sessionId, droppedStates });
    }
    return removed;
  }

  sweepExpired(): SweepResult {
    const now = this.now();
    const expiredStates = this.states.sweep(now);
    const removedSessions = this.credentials.deleteIdleSince(now - this.sessionIdleMs);
    for (const sessionId of removedSessions) {
      this.states.dropForSession(sessionId);
    }

    if (expiredStates > 0 || removedSessions.length > 0) {
      logger.info('Swept expired session data', {
        expiredStates,
        removedSessions: removedSessions.length,
      });
    }
    return { expiredStates, removedSessions };
  }

  stats(): RegistryStats {
    return {
      sessions: this.credentials.size,
      boundSessions: this.credentials.countBound(),
      pendingStates: this.states.size,
    };
  }
}
