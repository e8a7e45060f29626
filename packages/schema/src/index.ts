/**
 * @sysml-sql/schema
 *
 * JSON-Schema to SQLite DDL
 */

export { resolveSchema, type ResolveOptions } from './resolver.js';
export {
  emitSchema,
  createDefaultClassifier,
  createTableStatement,
  createIndexStatement,
  isIdentityDefinition,
  type Classifier,
  type DefinitionCategory,
  type EmitOptions,
  type GeneratedSchema,
} from './emitter.js';
