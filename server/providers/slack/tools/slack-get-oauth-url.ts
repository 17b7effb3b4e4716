/**
 * slack_get_oauth_url
 *
 * Returns the Slack authorization URL for the calling MCP session. Visiting it
 * and approving binds the resulting token to this session.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../../../observability/logger.js';
import { FlowError } from '../../../slack-oauth/errors.js';
import { jsonToolResult, resolveToolSessionId, type SlackToolDeps } from '../types.js';

export interface OAuthUrlResult {
  [key: string]: unknown;
  ok: boolean;
  authorization_url?: string;
  instructions?: string;
  error?: string;
}

export function getOAuthUrl(deps: Pick<SlackToolDeps, 'flow'>, sessionId: string | undefined): OAuthUrlResult {
  try {
    return {
      ok: true,
      authorization_url: deps.flow.issueUrl(sessionId),
      instructions:
        'Visit the authorization URL to authenticate. ' +
        'After authorization, Slack tools in this session will act as your Slack user.',
    };
  } catch (error) {
    if (error instanceof FlowError) {
      logger.warn('Could not issue OAuth URL', { kind: error.kind, sessionId });
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

export function registerSlackGetOAuthUrlTool(mcp: McpServer, deps: SlackToolDeps): void {
  mcp.registerTool(
    'slack_get_oauth_url',
    {
      title: 'Get Slack OAuth URL',
      description: 'Get the OAuth authorization URL for users to authenticate with Slack.',
      inputSchema: {},
    },
    async (_, extra) => {
      const sessionId = resolveToolSessionId(deps.context, extra);
      return jsonToolResult(getOAuthUrl(deps, sessionId));
    },
  );
}
