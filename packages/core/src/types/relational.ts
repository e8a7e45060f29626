/**
 * Relational (SQLite) schema types
 */

export type ColumnType = 'TEXT' | 'INTEGER' | 'REAL' | 'ANY';

export interface RelationalColumn {
  readonly name: string;
  readonly type: ColumnType;
  /** `framework` for fixed columns, else the first definition contributing it */
  readonly source: string;
}

/** Column as reported by the database */
export interface TableColumn {
  readonly name: string;
  /** Declared type, upper case (`TEXT`, `INTEGER`, `REAL`, `ANY`, `BLOB`) */
  readonly type: string;
  readonly notNull: boolean;
  readonly primaryKey: boolean;
}

/** Values the database gateway accepts as parameters */
export type SqlValue = string | number | bigint | Buffer | null;
