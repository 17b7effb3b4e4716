/**
 * OAuth State Registry
 *
 * One-time CSRF tokens for the Slack authorization redirect. Each token maps
 * to the session that asked for the URL and expires after a fixed TTL whether
 * or not it was ever used.
 */

import crypto from 'crypto';

/** 32 bytes = 256 bits of entropy */
export const STATE_TOKEN_BYTES = 32;

export interface OAuthStateEntry {
  sessionId: string;
  issuedAt: number;
}

export class OAuthStateRegistry {
  private readonly states = new Map<string, OAuthStateEntry>();

  constructor(private readonly ttlMs: number) {}

  get size(): number {
    return this.states.size;
  }

  issue(sessionId: string, now: number): string {
    let state = crypto.randomBytes(STATE_TOKEN_BYTES).toString('base64url');
    while (this.states.has(state)) {
      state = crypto.randomBytes(STATE_TOKEN_BYTES).toString('base64url');
    }
    this.states.set(state, { sessionId, issuedAt: now });
    return state;
  }

  isExpired(entry: OAuthStateEntry, now: number): boolean {
    return now - entry.issuedAt > this.ttlMs;
  }

  /** Owner of a live token; expired or unknown tokens yield undefined */
  peekOwner(state: string, now: number): string | undefined {
    const entry = this.states.get(state);
    if (!entry || this.isExpired(entry, now)) {
      return undefined;
    }
    return entry.sessionId;
  }

  /**
   * Check and delete in one step. The entry is gone afterwards whatever the
   * outcome, so a token cannot be retried after a mismatch.
   */
  consume(state: string, expectedSessionId: string, now: number): { valid: boolean; reason?: 'unknown' | 'expired' | 'session_mismatch' } {
    const entry = this.states.get(state);
    if (!entry) {
      return { valid: false, reason: 'unknown' };
    }

    this.states.delete(state);

    if (this.isExpired(entry, now)) {
      return { valid: false, reason: 'expired' };
    }
    if (entry.sessionId !== expectedSessionId) {
      return { valid: false, reason: 'session_mismatch' };
    }
    return { valid: true };
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [state, entry] of this.states) {
      if (this.isExpired(entry, now)) {
        this.states.delete(state);
        removed++;
      }
    }
    return removed;
  }

  dropForSession(sessionId: string): number {
    let removed = 0;
    for (const [state, entry] of this.states) {
      if (entry.sessionId === sessionId) {
        this.states.delete(state);
        removed++;
      }
    }
    return removed;
  }
}
