/**
 * Errors raised while issuing authorization URLs and handling callbacks.
 * Each kind carries the HTTP status the callback page is served with.
 */

export type FlowErrorKind =
  | 'ConfigurationError'
  | 'SessionUnavailable'
  | 'MissingCode'
  | 'MissingState'
  | 'ProviderDenied'
  | 'InvalidOrExpiredState'
  | 'TokenExchangeFailed';

export abstract class FlowError extends Error {
  abstract readonly kind: FlowErrorKind;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends FlowError {
  readonly kind = 'ConfigurationError';
  readonly httpStatus = 500;

  constructor(message: string = 'OAuth not configured. Please set SLACK_CLIENT_ID and SLACK_CLIENT_SECRET.') {
    super(message);
  }
}

export class SessionUnavailableError extends FlowError {
  readonly kind = 'SessionUnavailable';
  readonly httpStatus = 400;

  constructor(message: string = 'No session ID found. Unable to generate OAuth URL.') {
    super(message);
  }
}

export class MissingCodeError extends FlowError {
  readonly kind = 'MissingCode';
  readonly httpStatus = 400;

  constructor() {
    super('No authorization code received.');
  }
}

export class MissingStateError extends FlowError {
  readonly kind = 'MissingState';
  readonly httpStatus = 400;

  constructor() {
    super('Missing OAuth state parameter.');
  }
}

export class ProviderDeniedError extends FlowError {
  readonly kind = 'ProviderDenied';
  readonly httpStatus = 400;

  constructor(public readonly providerError: string) {
    super(`Slack returned an error: ${providerError}`);
  }
}

export class InvalidOrExpiredStateError extends FlowError {
  readonly kind = 'InvalidOrExpiredState';
  readonly httpStatus = 400;

  constructor() {
    super('Invalid or expired OAuth state parameter.');
  }
}

export class TokenExchangeFailedError extends FlowError {
  readonly kind = 'TokenExchangeFailed';
  readonly httpStatus = 500;

  constructor(message: string) {
    super(message);
  }
}
