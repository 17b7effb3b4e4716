/**
 * Credential Store
 *
 * Process-lifetime map from MCP session id to its session record and the
 * Slack credential bound to it. Nothing here is persisted.
 *
 * Records handed out are copies: callers never hold a reference into the map,
 * so a later write cannot be observed half-done.
 */

export interface BoundCredential {
  accessToken: string;
  /** Slack user id the token acts as */
  externalUserId: string;
  scopes: string[];
  obtainedAt: number;
  teamId?: string;
}

export interface Session {
  sessionId: string;
  createdAt: number;
  lastSeenAt: number;
  credential?: BoundCredential;
}

function snapshot(session: Session): Session {
  return {
    ...session,
    credential: session.credential
      ? { ...session.credential, scopes: [...session.credential.scopes] }
      : undefined,
  };
}

export class CredentialStore {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  /** Return the existing record or create an empty one */
  ensure(sessionId: string, now: number): { session: Session; created: boolean } {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastSeenAt = now;
      return { session: snapshot(existing), created: false };
    }

    const session: Session = { sessionId, createdAt: now, lastSeenAt: now };
    this.sessions.set(sessionId, session);
    return { session: snapshot(session), created: true };
  }

  touch(sessionId: string, now: number): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.lastSeenAt = now;
    return true;
  }

  /** Attach a credential to an existing session; false when it is gone */
  setCredential(sessionId: string, credential: BoundCredential, now: number): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    this.sessions.set(sessionId, {
      ...session,
      lastSeenAt: now,
      credential: { ...credential, scopes: [...credential.scopes] },
    });
    return true;
  }

  clearCredential(sessionId: string, now: number): boolean {
    const session = this.sessions.get(sessionId);
    if (!session?.credential) {
      return false;
    }
    this.sessions.set(sessionId, { ...session, credential: undefined, lastSeenAt: now });
    return true;
  }

  getCredential(sessionId: string): BoundCredential | undefined {
    const credential = this.sessions.get(sessionId)?.credential;
    return credential ? { ...credential, scopes: [...credential.scopes] } : undefined;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Remove sessions idle since before `cutoff`; returns their ids */
  deleteIdleSince(cutoff: number): string[] {
    const removed: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (session.lastSeenAt < cutoff) {
        this.sessions.delete(sessionId);
        removed.push(sessionId);
      }
    }
    return removed;
  }

  countBound(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.credential) count++;
    }
    return count;
  }
}
