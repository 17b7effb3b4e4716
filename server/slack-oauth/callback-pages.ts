/**
 * HTML pages served by the OAuth callback endpoint
 */

import type { FlowError } from './errors.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderPage(title: string, paragraphs: string[]): string {
  const body = paragraphs.map((text) => `    <p>${text}</p>`).join('\n');
  return `<!DOCTYPE html>
<html>
  <head><title>${title}</title></head>
  <body>
    <h1>${title}</h1>
${body}
  </body>
</html>`;
}

export function renderSuccessPage(externalUserId: string): string {
  return renderPage('Authentication Successful', [
    `You have been authenticated as user: <strong>${escapeHtml(externalUserId)}</strong>`,
    'Your session is now authorized to access Slack.',
    'You can close this window.',
  ]);
}

export function renderFlowErrorPage(error: FlowError): string {
  switch (error.kind) {
    case 'ProviderDenied':
      return renderPage('OAuth Error', [
        `Error: ${escapeHtml(error.message)}`,
        'You can close this window.',
      ]);
    case 'MissingCode':
      return renderPage('OAuth Error', [
        'No authorization code received.',
        'You can close this window.',
      ]);
    case 'MissingState':
      return renderPage('Authentication Failed', [
        'Error: Missing OAuth state parameter.',
        'This may indicate a CSRF attack attempt.',
        'You can close this window.',
      ]);
    case 'InvalidOrExpiredState':
      return renderPage('Authentication Failed', [
        'Error: Invalid or expired OAuth state parameter.',
        'Please generate a new OAuth URL using the slack_get_oauth_url tool.',
        'You can close this window.',
      ]);
    case 'TokenExchangeFailed':
    case 'ConfigurationError':
    case 'SessionUnavailable':
      return renderPage('Authentication Failed', [
        `Error: ${escapeHtml(error.message)}`,
        'You can close this window.',
      ]);
  }
}

export function renderUnexpectedErrorPage(): string {
  return renderPage('Authentication Failed', [
    'An unexpected error occurred during authentication.',
    'You can close this window and try again.',
  ]);
}
