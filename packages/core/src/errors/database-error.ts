import { BaseError, type ErrorDetails } from './base-error.js';

export type DatabaseErrorCode =
  | 'OPEN_FAILED'
  | 'STATEMENT_FAILED'
  | 'TRANSACTION_STATE'
  | 'INVALID_IDENTIFIER';

export class DatabaseError extends BaseError<DatabaseErrorCode> {
  constructor(details: ErrorDetails<DatabaseErrorCode>) {
    super('DatabaseError', details);
  }
}
