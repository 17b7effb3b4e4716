import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { CallToolResult, ServerNotification, ServerRequest } from '@modelcontextprotocol/sdk/types.js';
import type { AuthorizationFlow } from '../../slack-oauth/authorization-flow.js';
import type { SessionContext } from '../../session/session-context.js';
import type { SessionRegistry } from '../../session/session-registry.js';

/**
 * Collaborators every Slack tool is registered with
 */
export interface SlackToolDeps {
  registry: SessionRegistry;
  context: SessionContext;
  flow: AuthorizationFlow;
}

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

/** Tool results are plain JSON objects rendered as a single text block */
export function jsonToolResult(payload: Record<string, unknown>): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Session id for a tool call. The request context is authoritative; the id
 * the SDK reports for the transport is used when the context has none, and is
 * then published so later lookups in this request agree.
 */
export function resolveToolSessionId(context: SessionContext, extra: Pick<ToolExtra, 'sessionId'>): string | undefined {
  const fromContext = context.getSessionId();
  if (fromContext) {
    return fromContext;
  }
  if (extra.sessionId) {
    context.bindSessionForRequest(extra.sessionId);
  }
  return extra.sessionId;
}
