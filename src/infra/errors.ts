/**
 * Domain error types layered on the retry taxonomy.
 */

import { NonRetryableError } from './retry';

/**
 * Non-2xx response from the marketplace. 429 and 5xx are retried by withRetry
 * through the statusCode check; everything else is not.
 */
export class MarketplaceApiError extends Error {
  readonly statusCode: number;
  readonly body: string;

  constructor(operation: string, statusCode: number, body: string) {
    super(`${operation} failed (${statusCode}): ${body.slice(0, 300)}`);
    this.name = 'MarketplaceApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

/** The remote object no longer exists. Teardown treats this as success. */
export class NotFoundError extends NonRetryableError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Credential expired, revoked or undecryptable. The user has to reconnect. */
export class CredentialError extends NonRetryableError {
  readonly userId: string;

  constructor(userId: string, message: string) {
    super(message);
    this.name = 'CredentialError';
    this.userId = userId;
  }
}

/** Storage under the event ledger is unusable; the worker pool halts. */
export class PipelineFatalError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'PipelineFatalError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
