import type { SessionContext } from './session-context.js';
import type { BoundCredential, SessionRegistry } from './session-registry.js';

/**
 * Credential bound to the session of the request currently being handled.
 * Slack resource calls use this instead of taking a token argument.
 */
export function getCurrentCredential(
  context: SessionContext,
  registry: SessionRegistry,
): BoundCredential | undefined {
  const sessionId = context.getSessionId();
  return sessionId ? registry.getCredential(sessionId) : undefined;
}
