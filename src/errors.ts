import { PageResult } from './types.js';

export type MailErrorKind = 'config' | 'auth' | 'transport' | 'protocol' | 'not_found';

export abstract class MailError extends Error {
  abstract readonly kind: MailErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing or invalid environment; raised before any network call
export class ConfigError extends MailError {
  readonly kind = 'config';
}

export class AuthError extends MailError {
  readonly kind = 'auth';

  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

export class TransportError extends MailError {
  readonly kind = 'transport';

  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

export class ProtocolError extends MailError {
  readonly kind = 'protocol';
}

export class NotFoundError extends MailError {
  readonly kind = 'not_found';
}

export type RetryableError = AuthError | TransportError;
export type FetchFailure = RetryableError | ProtocolError;

/**
 * Result of a single page fetch. Failures are returned, not thrown, so the
 * paginator can branch on `error.kind`.
 */
export type FetchOutcome<T> =
  | { ok: true; page: PageResult<T> }
  | { ok: false; error: FetchFailure };

export function isRetryable(error: unknown): error is RetryableError {
  return error instanceof AuthError || error instanceof TransportError;
}

export function isFetchFailure(error: unknown): error is FetchFailure {
  return isRetryable(error) || error instanceof ProtocolError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown';
}
