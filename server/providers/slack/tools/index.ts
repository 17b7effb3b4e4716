import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SlackToolDeps } from '../types.js';
import { registerSlackGetOAuthUrlTool } from './slack-get-oauth-url.js';
import { registerSlackAuthStatusTool } from './slack-auth-status.js';
import { registerSlackLogoutTool } from './slack-logout.js';

export const SLACK_TOOL_NAMES = ['slack_get_oauth_url', 'slack_auth_status', 'slack_logout'] as const;

/**
 * Register all Slack session tools with the MCP server
 */
export function registerSlackTools(mcp: McpServer, deps: SlackToolDeps): void {
  registerSlackGetOAuthUrlTool(mcp, deps);
  registerSlackAuthStatusTool(mcp, deps);
  registerSlackLogoutTool(mcp, deps);
}
