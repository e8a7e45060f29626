/**
 * @sysml-sql/core
 *
 * Shared types, errors, interfaces and utilities
 */

// Types
export * from './types/index.js';

// Names of tables and framework columns
export * from './constants.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
