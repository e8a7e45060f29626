/**
 * SQLite Client
 *
 * Wrapper around better-sqlite3 implementing the database gateway.
 * better-sqlite3 is synchronous, which matches the importer: one non-suspending
 * pass inside one transaction.
 */

import Database from 'better-sqlite3';
import {
  DatabaseError,
  escapeSqlIdent,
  errorMessage,
  tableInfoRowSchema,
  type IDatabaseGateway,
  type Logger,
  type SqlValue,
  type TableColumn,
} from '@sysml-sql/core';

export interface SqliteClientConfig {
  /** Database file, or `:memory:` */
  path: string;
  /** Open read-only (queries only) */
  readonly?: boolean;
  /** Enforce foreign keys (default: true) */
  foreignKeys?: boolean;
  logger?: Logger;
}

/** Parameters per `IN (...)` list, well below SQLite's variable limit */
const DELETE_CHUNK_SIZE = 500;

function validateIdentifier(name: string, type: string): void {
  if (name.length === 0 || name.includes('\0')) {
    throw new DatabaseError({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid ${type} name: ${JSON.stringify(name)}`,
      suggestion: `${type} names must be non-empty and must not contain NUL characters.`,
    });
  }
}

export class SqliteClient implements IDatabaseGateway {
  private readonly db: Database.Database;
  private readonly statements = new Map<string, Database.Statement>();
  private readonly logger?: Logger;

  constructor(config: SqliteClientConfig) {
    this.logger = config.logger;
    try {
      this.db = new Database(config.path, {
        readonly: config.readonly ?? false,
        fileMustExist: config.readonly ?? false,
      });
    } catch (error) {
      throw new DatabaseError({
        code: 'OPEN_FAILED',
        message: `Cannot open database ${config.path}: ${errorMessage(error)}`,
        suggestion: 'Check that the directory exists and is writable.',
        cause: error instanceof Error ? error : undefined,
        context: { path: config.path },
      });
    }

    this.db.pragma(`foreign_keys = ${config.foreignKeys === false ? 'OFF' : 'ON'}`);
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  executeDdl(sql: string): void {
    this.logger?.trace('Executing DDL', { sql });
    this.run(sql, () => {
      this.db.exec(sql);
    });
  }

  upsert(table: string, columns: readonly string[], values: readonly SqlValue[]): void {
    if (columns.length !== values.length) {
      throw new DatabaseError({
        code: 'STATEMENT_FAILED',
        message: `Upsert into ${table}: ${columns.length} columns but ${values.length} values`,
        context: { table },
      });
    }
    validateIdentifier(table, 'table');
    columns.forEach((column) => validateIdentifier(column, 'column'));

    const sql = `INSERT OR REPLACE INTO ${escapeSqlIdent(table)} (${columns
      .map(escapeSqlIdent)
      .join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`;
    this.run(sql, () => this.prepare(sql).run(...values));
  }

  deleteWhereIn(table: string, column: string, values: readonly string[]): number {
    validateIdentifier(table, 'table');
    validateIdentifier(column, 'column');

    let deleted = 0;
    for (let offset = 0; offset < values.length; offset += DELETE_CHUNK_SIZE) {
      const chunk = values.slice(offset, offset + DELETE_CHUNK_SIZE);
      const sql = `DELETE FROM ${escapeSqlIdent(table)} WHERE ${escapeSqlIdent(column)} IN (${chunk
        .map(() => '?')
        .join(', ')})`;
      deleted += this.run(sql, () => this.prepare(sql).run(...chunk).changes);
    }
    return deleted;
  }

  tableColumns(table: string): TableColumn[] {
    const sql = 'SELECT "name", "type", "notnull", "pk" FROM pragma_table_info(?)';
    const rows = this.run(sql, () => this.prepare(sql).all(table));
    const parsed = tableInfoRowSchema.array().safeParse(rows);
    if (!parsed.success) {
      throw new DatabaseError({
        code: 'STATEMENT_FAILED',
        message: `Unexpected table_info rows for ${table}`,
        context: { table },
      });
    }
    return parsed.data.map((row) => ({
      name: row.name,
      type: row.type.toUpperCase(),
      notNull: row.notnull !== 0,
      primaryKey: row.pk !== 0,
    }));
  }

  hasKey(table: string, column: string, value: string): boolean {
    validateIdentifier(table, 'table');
    validateIdentifier(column, 'column');
    const sql = `SELECT 1 FROM ${escapeSqlIdent(table)} WHERE ${escapeSqlIdent(column)} = ? LIMIT 1`;
    return this.run(sql, () => this.prepare(sql).get(value)) !== undefined;
  }

  count(table: string): number {
    validateIdentifier(table, 'table');
    const sql = `SELECT COUNT(*) FROM ${escapeSqlIdent(table)}`;
    const value = this.run(sql, () => this.prepare(sql).pluck().get());
    return typeof value === 'number' ? value : Number(value);
  }

  /**
   * Execute a query and return its rows
   */
  query<T = Record<string, unknown>>(sql: string, params: readonly SqlValue[] = []): T[] {
    return this.run(sql, () => this.prepare(sql).all(...params) as T[]);
  }

  /**
   * Run a pragma; `simple` returns the first column of the first row
   */
  pragma(source: string, simple = false): unknown {
    this.logger?.trace('Pragma', { source });
    return this.run(source, () => this.db.pragma(source, { simple }));
  }

  beginTransaction(): void {
    if (this.db.inTransaction) {
      throw new DatabaseError({
        code: 'TRANSACTION_STATE',
        message: 'A transaction is already open',
      });
    }
    this.executeDdl('BEGIN');
  }

  commit(): void {
    this.executeDdl('COMMIT');
  }

  rollback(): void {
    if (this.db.inTransaction) {
      this.executeDdl('ROLLBACK');
    }
  }

  close(): void {
    this.statements.clear();
    if (this.db.open) this.db.close();
  }

  private prepare(sql: string): Database.Statement {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }

  private run<T>(sql: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof DatabaseError) throw error;
      const code =
        error instanceof Error && 'code' in error && typeof error.code === 'string'
          ? error.code
          : undefined;
      throw new DatabaseError({
        code: 'STATEMENT_FAILED',
        message: `Statement failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
        context: { sql: sql.length > 200 ? `${sql.slice(0, 200)}...` : sql, sqliteCode: code },
      });
    }
  }
}
