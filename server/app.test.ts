/**
 * App wiring tests
 *
 * Runs the Express app on an ephemeral local port and talks to it with the
 * MCP SDK's streamable HTTP client, so the body parser, the binding
 * middleware and the MCP transport all run as they do in production.
 */

import type { Server } from 'node:http';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { createApp, type AppBundle } from './app.js';
import { loadConfig } from './config/app-config.js';
import { stateFromUrl } from './slack-oauth/test-fixtures.js';

function listen(bundle: AppBundle): Promise<Server> {
  return new Promise((resolve) => {
    const server = bundle.app.listen(0, '127.0.0.1', () => resolve(server));
  });
}

describe('createApp', () => {
  let bundle: AppBundle;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    bundle = createApp(
      loadConfig({ SLACK_CLIENT_ID: 'test-client-id', SLACK_CLIENT_SECRET: 'test-secret' }),
      'test',
    );
    server = await listen(bundle);
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await bundle.mcpService.closeAll();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('should issue the OAuth state to the MCP session that called the tool', async () => {
    const transport = new StreamableHTTPClientTransport(new URL('/mcp', baseUrl));
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(transport);
    const getSessionId = jest.spyOn(bundle.context, 'getSessionId');

    const result = await client.callTool({ name: 'slack_get_oauth_url', arguments: {} });

    const [block] = result.content as Array<{ type: string; text: string }>;
    const payload = JSON.parse(block.text);
    expect(payload.ok).toBe(true);
    expect(transport.sessionId).toBeDefined();
    expect(bundle.registry.peekStateOwner(stateFromUrl(payload.authorization_url))).toBe(transport.sessionId);
    // The tool saw the session through the request context, not only the SDK's extra
    expect(getSessionId.mock.results[0]?.value).toBe(transport.sessionId);

    await client.close();
  });

  it('should answer an unknown callback state with a 400 page', async () => {
    const res = await fetch(`${baseUrl}/oauth2callback?state=unknown&code=x`);

    expect(res.status).toBe(400);
    expect(await res.text()).toContain('Invalid or expired OAuth state parameter.');
  });

  it('should report health with registry counts', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'healthy',
      oauthConfigured: true,
      mcpSessions: 0,
      sessions: 0,
      boundSessions: 0,
      pendingStates: 0,
    });
  });
});
