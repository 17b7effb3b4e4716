/**
 * Session Context
 *
 * Per-request slot holding the active MCP session id. A `SessionScope` is
 * created for every inbound request, attached to `res.locals` and made ambient
 * through AsyncLocalStorage, so tool handlers deep in the MCP SDK can read it
 * without the id being threaded through every call.
 *
 * Concurrent requests each run inside their own scope and never see each
 * other's ids.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export class SessionScope {
  private sessionId: string | undefined;

  constructor(sessionId?: string) {
    this.sessionId = sessionId;
  }

  getSessionId(): string | undefined {
    return this.sessionId;
  }

  bind(sessionId: string): void {
    this.sessionId = sessionId;
  }

  clear(): void {
    this.sessionId = undefined;
  }
}

export class SessionContext {
  private readonly storage = new AsyncLocalStorage<SessionScope>();

  run<T>(scope: SessionScope, fn: () => T): T {
    return this.storage.run(scope, fn);
  }

  currentScope(): SessionScope | undefined {
    return this.storage.getStore();
  }

  getSessionId(): string | undefined {
    return this.storage.getStore()?.getSessionId();
  }

  /**
   * Publish `sessionId` into the current request's scope.
   * Returns false when called outside any request.
   */
  bindSessionForRequest(sessionId: string): boolean {
    const scope = this.storage.getStore();
    if (!scope) {
      return false;
    }
    scope.bind(sessionId);
    return true;
  }

  /**
   * Clear the session of `scope`, or of the current request when omitted.
   * Request exit hooks pass the scope explicitly since they may fire outside
   * the request's async context.
   */
  clearSession(scope: SessionScope | undefined = this.storage.getStore()): void {
    scope?.clear();
  }
}
