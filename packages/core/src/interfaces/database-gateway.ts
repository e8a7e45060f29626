/**
 * Statement-execution surface used by the schema initialisation and the importer
 *
 * Synchronous: the importer is a non-suspending pass and runs inside one
 * transaction per import run.
 */

import type { SqlValue, TableColumn } from '../types/index.js';

export interface IDatabaseGateway {
  /** Execute one or more DDL statements */
  executeDdl(sql: string): void;

  /** `INSERT OR REPLACE` one row */
  upsert(table: string, columns: readonly string[], values: readonly SqlValue[]): void;

  /**
   * Delete every row whose `column` is one of `values`
   * @returns number of deleted rows
   */
  deleteWhereIn(table: string, column: string, values: readonly string[]): number;

  /** Columns of a table, in declaration order; empty when the table does not exist */
  tableColumns(table: string): TableColumn[];

  hasKey(table: string, column: string, value: string): boolean;

  count(table: string): number;

  beginTransaction(): void;
  commit(): void;
  rollback(): void;

  /** Whether a transaction is open */
  readonly inTransaction: boolean;
}
