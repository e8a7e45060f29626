/**
 * Errors of the SysML v2 API client
 */

import { BaseError, type ErrorDetails } from './base-error.js';

export type FetchErrorCode =
  /** Network error before a response arrived (retried) */
  | 'CONNECTION_FAILED'
  /** HTTP 5xx (retried) */
  | 'SERVER_ERROR'
  /** A transient cause persisted through every attempt */
  | 'TRANSIENT_EXHAUSTED'
  /** Non-transient HTTP status (4xx and anything else not successful) */
  | 'HTTP_STATUS'
  | 'MALFORMED_PAGINATION'
  | 'MALFORMED_RESPONSE'
  | 'TIMEOUT'
  | 'TLS_FAILURE'
  /** No or several projects/branches match a selector */
  | 'SELECTION_FAILED'
  | 'CONFIGURATION_ERROR';

export type FetchErrorDetails = ErrorDetails<FetchErrorCode>;

const TRANSIENT_CODES: ReadonlySet<FetchErrorCode> = new Set<FetchErrorCode>([
  'CONNECTION_FAILED',
  'SERVER_ERROR',
]);

export class FetchError extends BaseError<FetchErrorCode> {
  constructor(details: FetchErrorDetails) {
    super('FetchError', details);
  }

  /** Whether a replay of the same request may succeed */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}

export function isTransientFetchError(err: unknown): boolean {
  return err instanceof FetchError && err.transient;
}
