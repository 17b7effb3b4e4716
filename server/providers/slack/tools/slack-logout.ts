import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { jsonToolResult, resolveToolSessionId, type SlackToolDeps } from '../types.js';

export function registerSlackLogoutTool(mcp: McpServer, deps: SlackToolDeps): void {
  mcp.registerTool(
    'slack_logout',
    {
      title: 'Slack Logout',
      description: 'Forget the Slack credential bound to this session.',
      inputSchema: {},
    },
    async (_, extra) => {
      const sessionId = resolveToolSessionId(deps.context, extra);
      if (!sessionId) {
        return jsonToolResult({ ok: false, error: 'No session ID found.' });
      }
      return jsonToolResult({ ok: true, removed: deps.registry.unbindCredential(sessionId) });
    },
  );
}
