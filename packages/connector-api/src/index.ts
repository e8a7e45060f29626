/**
 * @sysml-sql/connector-api
 *
 * Client of the SysML v2 REST API
 */

export * from './sysml/index.js';
