/**
 * Startup banner and masking helpers
 */

import { isSlackOAuthConfigured, type AppConfig } from './config/app-config.js';
import { SLACK_TOOL_NAMES } from './providers/slack/tools/index.js';

/**
 * Mask sensitive data in strings for logging
 */
export function maskSensitive(value: string | undefined, showLength: number = 10): string {
  if (!value) return 'NOT SET';
  if (value.length <= showLength) return value;
  return `${value.substring(0, showLength)}... (length: ${value.length})`;
}

/**
 * Lines printed when the server starts
 */
export function buildStartupBanner(config: AppConfig, version: string): string[] {
  const lines = [
    'Slack MCP Session Bridge',
    '='.repeat(35),
    'Server Information:',
    `   Version: ${version}`,
    '   Transport: streamable HTTP',
    `   URL: ${config.displayUrl}/mcp`,
    `   OAuth Callback: ${config.slack.redirectUri}`,
    `   Node: ${process.version}`,
    '',
    'Active Configuration:',
    `   - SLACK_CLIENT_ID: ${maskSensitive(config.slack.clientId)}`,
    `   - SLACK_CLIENT_SECRET: ${config.slack.clientSecret ? 'present' : 'NOT SET'}`,
    `   - SLACK_MCP_BASE_URI: ${config.baseUri}`,
    `   - SLACK_MCP_PORT: ${config.port}`,
    `   - User scopes: ${config.slack.userScopes.join(',')}`,
    '',
    'Available Tools:',
    ...SLACK_TOOL_NAMES.map((name) => `   - ${name}`),
    '',
  ];

  if (!isSlackOAuthConfigured(config.slack)) {
    lines.push(
      'Warning: OAuth not configured!',
      '   Please set SLACK_CLIENT_ID and SLACK_CLIENT_SECRET environment variables',
      '',
    );
  }

  return lines;
}

export function logEnvironmentInfo(config: AppConfig, version: string): void {
  for (const line of buildStartupBanner(config, version)) {
    console.log(line);
  }
}
