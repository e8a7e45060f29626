export { jsonValueSchema, elementRecordSchema } from './json.js';
export {
  schemaNodeSchema,
  schemaDocumentSchema,
  UNSUPPORTED_SCHEMA_KEYWORDS,
  SCHEMA_VALUED_KEYWORDS,
  type SchemaNode,
  type SchemaDocument,
} from './json-schema.js';
export { tableInfoRowSchema, type TableInfoRow } from './sqlite.js';
export { formatZodIssues } from './format.js';
