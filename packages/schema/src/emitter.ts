/**
 * DDL Emitter
 *
 * Projects resolved definitions onto two wide tables. Every element-like
 * definition contributes its fields to `elements`, every relation-like one to
 * `relations`; fields referencing other elements become rows of `relations`
 * instead of columns.
 */

import {
  DEFAULT_INDEXED_COLUMNS,
  DEFAULT_POLYMORPHIC_FIELDS,
  ELEMENTS_TABLE,
  ID_COLUMN,
  RELATIONS_TABLE,
  RELATION_NAME_COLUMN,
  RELATION_ORIGIN_COLUMN,
  RELATION_TARGET_COLUMN,
  SchemaError,
  TYPE_COLUMN,
  escapeSqlIdent,
  type ColumnType,
  type FieldDescriptor,
  type FieldKind,
  type Logger,
  type RelationalColumn,
  type ResolvedSchema,
  type SchemaDefinition,
} from '@sysml-sql/core';

export type DefinitionCategory = 'element' | 'relation' | 'skip';

export type Classifier = (definition: SchemaDefinition) => DefinitionCategory;

export interface EmitOptions {
  /** Partition of definitions; defaults to {@link createDefaultClassifier} */
  classify?: Classifier;
  /** Discriminators of relation-like definitions, for the default classifier */
  relationTypes?: readonly string[];
  polymorphicFields?: readonly string[];
  /** Columns of `elements` to index, when present */
  indexedColumns?: readonly string[];
  logger?: Logger;
}

export interface GeneratedSchema {
  elementColumns: RelationalColumn[];
  relationColumns: RelationalColumn[];
  /** Property names lowered into `relations` rows, sorted */
  relationNames: string[];
  statements: string[];
  /** All statements, separated by blank lines */
  ddl: string;
}

const FRAMEWORK = 'framework';

const ELEMENT_FRAMEWORK_COLUMNS: readonly RelationalColumn[] = [
  { name: ID_COLUMN, type: 'TEXT', source: FRAMEWORK },
  { name: TYPE_COLUMN, type: 'TEXT', source: FRAMEWORK },
];

const RELATION_FRAMEWORK_COLUMNS: readonly RelationalColumn[] = [
  ...ELEMENT_FRAMEWORK_COLUMNS,
  { name: RELATION_NAME_COLUMN, type: 'TEXT', source: FRAMEWORK },
  { name: RELATION_ORIGIN_COLUMN, type: 'TEXT', source: FRAMEWORK },
  { name: RELATION_TARGET_COLUMN, type: 'TEXT', source: FRAMEWORK },
];

/** Pseudo column type of a field lowered into `relations` */
const RELATION = 'RELATION';

/** Definitions whose only field is the identifier (`Identified`) */
export function isIdentityDefinition(definition: SchemaDefinition): boolean {
  const [only, ...rest] = definition.fields;
  return definition.kind === 'object' && only?.name === ID_COLUMN && rest.length === 0;
}

/**
 * SysML convention: a definition is element-like when it carries a type-tag
 * discriminator, relation-like when that discriminator is listed
 */
export function createDefaultClassifier(relationTypes: readonly string[] = []): Classifier {
  const relations = new Set(relationTypes);
  return (definition) => {
    if (isIdentityDefinition(definition)) return 'skip';
    if (definition.discriminator === undefined) return 'skip';
    return relations.has(definition.discriminator) ? 'relation' : 'element';
  };
}

function columnTypeOfKind(kind: FieldKind): ColumnType {
  switch (kind) {
    case 'string':
      return 'TEXT';
    case 'integer':
    case 'boolean':
      return 'INTEGER';
    case 'number':
      return 'REAL';
    case 'any':
      return 'ANY';
    case 'array':
    case 'object':
    case 'reference':
      return 'TEXT';
  }
}

interface ColumnEntry {
  name: string;
  type: ColumnType | typeof RELATION;
  source: string;
}

class TableColumns {
  private readonly columns = new Map<string, ColumnEntry>();

  constructor(
    readonly table: string,
    private readonly framework: readonly RelationalColumn[]
  ) {}

  add(name: string, type: ColumnType | typeof RELATION, source: string): void {
    if (this.framework.some((c) => c.name === name)) return;
    const existing = this.columns.get(name);
    if (!existing) {
      this.columns.set(name, { name, type, source });
      return;
    }
    if (existing.type !== type) {
      throw SchemaError.columnTypeConflict(this.table, name, existing.type, type);
    }
  }

  toColumns(): RelationalColumn[] {
    const out: RelationalColumn[] = [...this.framework];
    for (const column of this.columns.values()) {
      if (column.type === RELATION) continue;
      out.push({ name: column.name, type: column.type, source: column.source });
    }
    return out;
  }
}

class DdlEmitter {
  private readonly categories = new Map<string, DefinitionCategory>();
  private readonly polymorphic: ReadonlySet<string>;

  constructor(
    private readonly schema: ResolvedSchema,
    private readonly options: EmitOptions
  ) {
    this.polymorphic = new Set(options.polymorphicFields ?? DEFAULT_POLYMORPHIC_FIELDS);
    const classify = options.classify ?? createDefaultClassifier(options.relationTypes);
    for (const [name, definition] of schema.definitions) {
      this.categories.set(name, classify(definition));
    }
  }

  emit(): GeneratedSchema {
    const elements = new TableColumns(ELEMENTS_TABLE, ELEMENT_FRAMEWORK_COLUMNS);
    const relations = new TableColumns(RELATIONS_TABLE, RELATION_FRAMEWORK_COLUMNS);
    const relationNames = new Set<string>();

    const names = [...this.schema.definitions.keys()].sort();
    for (const name of names) {
      const definition = this.schema.definitions.get(name);
      const category = this.categories.get(name);
      if (!definition || category === undefined || category === 'skip') continue;

      const table = category === 'element' ? elements : relations;
      for (const field of definition.fields) {
        const relational = this.isRelationalField(field);
        if (relational) relationNames.add(field.name);

        if (this.polymorphic.has(field.name)) {
          table.add(field.name, 'ANY', name);
        } else if (relational) {
          table.add(field.name, RELATION, name);
        } else {
          table.add(field.name, this.columnType(field), name);
        }
      }
    }

    const elementColumns = elements.toColumns();
    const relationColumns = relations.toColumns();
    const statements = [
      createTableStatement(ELEMENTS_TABLE, elementColumns),
      createTableStatement(RELATIONS_TABLE, relationColumns),
      ...this.indexStatements(elementColumns),
    ];

    this.options.logger?.debug('Generated relational schema', {
      elementColumns: elementColumns.length,
      relationColumns: relationColumns.length,
      relationNames: relationNames.size,
    });

    return {
      elementColumns,
      relationColumns,
      relationNames: [...relationNames].sort(),
      statements,
      ddl: `${statements.join('\n\n')}\n`,
    };
  }

  private isRelationalTarget(name: string): boolean {
    const target = this.schema.definitions.get(name);
    if (!target) return false;
    if (target.kind === 'union' || isIdentityDefinition(target)) return true;
    const category = this.categories.get(name);
    return category === 'element' || category === 'relation';
  }

  private isRelationalRef(ref: string | undefined, variants: readonly string[] | undefined): boolean {
    if (ref !== undefined && this.isRelationalTarget(ref)) return true;
    return (variants ?? []).some((v) => this.isRelationalTarget(v));
  }

  private isRelationalField(field: FieldDescriptor): boolean {
    if (field.kind === 'reference') return this.isRelationalRef(field.ref, field.variants);
    if (field.kind === 'array' && field.items?.kind === 'reference') {
      return this.isRelationalRef(field.items.ref, field.items.variants);
    }
    return false;
  }

  private columnType(field: FieldDescriptor): ColumnType {
    if (field.kind === 'reference' && field.ref !== undefined) {
      const target = this.schema.definitions.get(field.ref);
      if (target?.kind === 'scalar' && target.scalarKind) {
        return columnTypeOfKind(target.scalarKind);
      }
    }
    return columnTypeOfKind(field.kind);
  }

  private indexStatements(elementColumns: readonly RelationalColumn[]): string[] {
    const present = new Set(elementColumns.map((c) => c.name));
    const indexed = [TYPE_COLUMN];
    for (const column of this.options.indexedColumns ?? DEFAULT_INDEXED_COLUMNS) {
      if (present.has(column) && !indexed.includes(column)) indexed.push(column);
    }
    return [
      ...indexed.map((column) => createIndexStatement(ELEMENTS_TABLE, column)),
      createIndexStatement(RELATIONS_TABLE, RELATION_NAME_COLUMN),
      createIndexStatement(RELATIONS_TABLE, RELATION_ORIGIN_COLUMN),
      createIndexStatement(RELATIONS_TABLE, RELATION_TARGET_COLUMN),
    ];
  }
}

function columnDefinition(table: string, column: RelationalColumn): string {
  const parts = [escapeSqlIdent(column.name), column.type];
  if (column.source === FRAMEWORK) {
    parts.push('NOT NULL');
    if (column.name === ID_COLUMN) parts.push('PRIMARY KEY');
    if (
      table === RELATIONS_TABLE &&
      (column.name === RELATION_ORIGIN_COLUMN || column.name === RELATION_TARGET_COLUMN)
    ) {
      parts.push(
        `REFERENCES ${escapeSqlIdent(ELEMENTS_TABLE)}(${escapeSqlIdent(ID_COLUMN)}) DEFERRABLE INITIALLY DEFERRED`
      );
    }
  }
  return parts.join(' ');
}

export function createTableStatement(table: string, columns: readonly RelationalColumn[]): string {
  const lines = columns.map((column) => `\t${columnDefinition(table, column)}`);
  return `CREATE TABLE IF NOT EXISTS ${escapeSqlIdent(table)} (\n${lines.join(',\n')}\n) STRICT;`;
}

export function createIndexStatement(table: string, column: string): string {
  return `CREATE INDEX IF NOT EXISTS ${escapeSqlIdent(`${table}.${column}`)} ON ${escapeSqlIdent(table)} (${escapeSqlIdent(column)});`;
}

/**
 * Emit the relational schema of a resolved schema
 *
 * Deterministic: an unchanged input yields byte-identical DDL.
 *
 * @throws SchemaError(COLUMN_TYPE_CONFLICT) when two fields of one table map to
 * different column types
 */
export function emitSchema(schema: ResolvedSchema, options: EmitOptions = {}): GeneratedSchema {
  return new DdlEmitter(schema, options).emit();
}
