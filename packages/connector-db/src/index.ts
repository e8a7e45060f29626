/**
 * @sysml-sql/connector-db
 *
 * SQLite database gateway
 */

export * from './sqlite/index.js';
