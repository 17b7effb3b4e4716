import { SLACK_AUTHORIZE_URL, SLACK_TOKEN_URL, type SlackOAuthSettings } from '../config/app-config.js';

export const configuredSettings: SlackOAuthSettings = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8001/oauth2callback',
  userScopes: ['channels:read', 'search:read'],
  authorizeUrl: SLACK_AUTHORIZE_URL,
  tokenUrl: SLACK_TOKEN_URL,
};

export const unconfiguredSettings: SlackOAuthSettings = {
  redirectUri: 'http://localhost:8001/oauth2callback',
  userScopes: ['channels:read'],
  authorizeUrl: SLACK_AUTHORIZE_URL,
  tokenUrl: SLACK_TOKEN_URL,
};

/** State parameter of an issued authorization URL */
export function stateFromUrl(url: string): string {
  const state = new URL(url).searchParams.get('state');
  if (!state) {
    throw new Error(`No state in ${url}`);
  }
  return state;
}
