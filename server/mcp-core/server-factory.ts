/**
 * MCP Server Factory
 *
 * Creates one MCP server instance per client session. Every instance shares
 * the same registry, context and authorization flow; what differs is only the
 * transport it is connected to.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../observability/logger.js';
import { registerSlackTools, SLACK_TOOL_NAMES } from '../providers/slack/tools/index.js';
import type { SlackToolDeps } from '../providers/slack/types.js';

export const SERVER_NAME = 'slack-mcp-session-bridge';

export function createMcpServer(deps: SlackToolDeps, version: string): McpServer {
  const mcp = new McpServer(
    {
      name: SERVER_NAME,
      version,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    },
  );

  registerSlackTools(mcp, deps);
  logger.debug('MCP server created', { tools: SLACK_TOOL_NAMES });

  return mcp;
}
