/**
 * Application configuration
 *
 * Reads the process environment once at startup and validates it with zod.
 * Slack client credentials are optional here: their absence does not stop the
 * server, it only disables URL issuance (see `isSlackOAuthConfigured`).
 */

import { z } from 'zod';

export const SLACK_AUTHORIZE_URL = 'https://slack.com/oauth/v2/authorize';
export const SLACK_TOKEN_URL = 'https://slack.com/api/oauth.v2.access';

export const DEFAULT_USER_SCOPES = [
  'channels:history',
  'channels:read',
  'groups:history',
  'groups:read',
  'im:history',
  'im:read',
  'mpim:history',
  'mpim:read',
  'search:read',
  'users:read',
];

// Blank values in a .env file count as unset
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SLACK_CLIENT_ID: optionalString,
  SLACK_CLIENT_SECRET: optionalString,
  SLACK_REDIRECT_URI: optionalString,
  SLACK_EXTERNAL_URL: optionalString,
  SLACK_USER_SCOPES: optionalString,
  SLACK_MCP_BASE_URI: z.string().trim().default('http://localhost'),
  SLACK_MCP_PORT: positiveInt(8001),
  OAUTH_STATE_TTL_SECONDS: positiveInt(600),
  SESSION_IDLE_TIMEOUT_SECONDS: positiveInt(24 * 60 * 60),
  SESSION_SWEEP_INTERVAL_SECONDS: positiveInt(60),
  TOKEN_EXCHANGE_TIMEOUT_MS: positiveInt(10_000),
});

export interface SlackOAuthSettings {
  clientId?: string;
  clientSecret?: string;
  redirectUri: string;
  userScopes: string[];
  authorizeUrl: string;
  tokenUrl: string;
}

/** Settings that carry both client credentials */
export interface ConfiguredSlackOAuth extends SlackOAuthSettings {
  clientId: string;
  clientSecret: string;
}

export interface AppConfig {
  port: number;
  baseUri: string;
  /** Public URL shown to users; the external URL when set, otherwise base URI and port */
  displayUrl: string;
  slack: SlackOAuthSettings;
  stateTtlMs: number;
  sessionIdleMs: number;
  sweepIntervalMs: number;
  tokenExchangeTimeoutMs: number;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function parseScopes(raw: string | undefined): string[] {
  if (!raw) {
    return [...DEFAULT_USER_SCOPES];
  }
  return raw.split(',').map((scope) => scope.trim()).filter((scope) => scope.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const displayUrl = (values.SLACK_EXTERNAL_URL ?? `${values.SLACK_MCP_BASE_URI}:${values.SLACK_MCP_PORT}`)
    .replace(/\/+$/, '');

  return {
    port: values.SLACK_MCP_PORT,
    baseUri: values.SLACK_MCP_BASE_URI,
    displayUrl,
    slack: {
      clientId: values.SLACK_CLIENT_ID,
      clientSecret: values.SLACK_CLIENT_SECRET,
      redirectUri: values.SLACK_REDIRECT_URI ?? `${displayUrl}/oauth2callback`,
      userScopes: parseScopes(values.SLACK_USER_SCOPES),
      authorizeUrl: SLACK_AUTHORIZE_URL,
      tokenUrl: SLACK_TOKEN_URL,
    },
    stateTtlMs: values.OAUTH_STATE_TTL_SECONDS * 1000,
    sessionIdleMs: values.SESSION_IDLE_TIMEOUT_SECONDS * 1000,
    sweepIntervalMs: values.SESSION_SWEEP_INTERVAL_SECONDS * 1000,
    tokenExchangeTimeoutMs: values.TOKEN_EXCHANGE_TIMEOUT_MS,
  };
}

export function isSlackOAuthConfigured(settings: SlackOAuthSettings): settings is ConfiguredSlackOAuth {
  return !!settings.clientId && !!settings.clientSecret;
}

/**
 * Build the Slack authorization URL for a freshly issued state token.
 * Scopes are requested as user scopes so the resulting token acts as the user.
 */
export function buildAuthorizationUrl(settings: ConfiguredSlackOAuth, state: string): string {
  const params = new URLSearchParams({
    client_id: settings.clientId,
    user_scope: settings.userScopes.join(','),
    redirect_uri: settings.redirectUri,
    state,
  });

  return `${settings.authorizeUrl}?${params.toString()}`;
}
