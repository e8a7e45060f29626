export { BaseError, errorMessage, type ErrorDetails } from './base-error.js';
export { SchemaError, type SchemaErrorCode, type SchemaErrorDetails } from './schema-error.js';
export {
  FetchError,
  isTransientFetchError,
  type FetchErrorCode,
  type FetchErrorDetails,
} from './fetch-error.js';
export {
  ImportError,
  type ImportErrorCode,
  type ImportErrorDetails,
  type DanglingReferenceContext,
} from './import-error.js';
export { ConfigError, type ConfigErrorCode } from './config-error.js';
export { DatabaseError, type DatabaseErrorCode } from './database-error.js';
