import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getCurrentCredential } from '../../../session/current-credential.js';
import { jsonToolResult, resolveToolSessionId, type SlackToolDeps } from '../types.js';

export interface AuthStatusResult {
  [key: string]: unknown;
  ok: boolean;
  authenticated: boolean;
  user_id?: string;
  team_id?: string;
  scopes?: string[];
  error?: string;
}

/**
 * Whether the current session has a bound Slack credential.
 * Reports who it acts as, never the token.
 */
export function getAuthStatus(deps: Pick<SlackToolDeps, 'context' | 'registry'>): AuthStatusResult {
  if (!deps.context.getSessionId()) {
    return { ok: false, authenticated: false, error: 'No session ID found.' };
  }

  const credential = getCurrentCredential(deps.context, deps.registry);
  if (!credential) {
    return { ok: true, authenticated: false };
  }

  return {
    ok: true,
    authenticated: true,
    user_id: credential.externalUserId,
    team_id: credential.teamId,
    scopes: credential.scopes,
  };
}

export function registerSlackAuthStatusTool(mcp: McpServer, deps: SlackToolDeps): void {
  mcp.registerTool(
    'slack_auth_status',
    {
      title: 'Slack Authentication Status',
      description: 'Report whether this session is authenticated with Slack and as which user.',
      inputSchema: {},
    },
    async (_, extra) => {
      resolveToolSessionId(deps.context, extra);
      return jsonToolResult(getAuthStatus(deps));
    },
  );
}
