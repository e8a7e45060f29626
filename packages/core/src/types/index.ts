export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export type { ElementRecord, PropertyValue, Element, Relation } from './element.js';
export type {
  FieldKind,
  ItemDescriptor,
  FieldDescriptor,
  DefinitionKind,
  SchemaDefinition,
  ResolvedSchema,
} from './schema.js';
export type { ColumnType, RelationalColumn, TableColumn, SqlValue } from './relational.js';
