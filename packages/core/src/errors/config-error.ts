import { BaseError, type ErrorDetails } from './base-error.js';

export type ConfigErrorCode = 'INVALID_CONFIG' | 'MISSING_ENV' | 'INVALID_ARGUMENT';

export class ConfigError extends BaseError<ConfigErrorCode> {
  constructor(details: ErrorDetails<ConfigErrorCode>) {
    super('ConfigError', details);
  }
}
