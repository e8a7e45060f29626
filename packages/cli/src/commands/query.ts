import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '@sysml-sql/core';
import { SqliteClient } from '@sysml-sql/connector-db';
import type { CommandContext } from '../context.js';

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (Buffer.isBuffer(value)) return `x'${value.toString('hex')}'`;
  if (typeof value === 'string') return value.replace(/\t/g, '\\t').replace(/\r?\n/g, '\\n');
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Rows as tab-separated lines under a header line
 */
export function formatRows(rows: readonly Record<string, unknown>[]): string[] {
  const [first] = rows;
  if (!first) return ['(no rows)'];
  const columns = Object.keys(first);
  return [columns.join('\t'), ...rows.map((row) => columns.map((c) => formatCell(row[c])).join('\t'))];
}

/**
 * Run one statement of a SQL file against a read-only connection
 */
export async function runQuery(dbFile: string, sqlFile: string, ctx: CommandContext): Promise<void> {
  let sql: string;
  try {
    sql = await readFile(sqlFile, 'utf-8');
  } catch (error) {
    throw new ConfigError({
      code: 'INVALID_ARGUMENT',
      message: `Cannot read query file ${sqlFile}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { sqlFile },
    });
  }

  const client = new SqliteClient({ path: dbFile, readonly: true, logger: ctx.logger });
  try {
    const rows = client.query(sql);
    formatRows(rows).forEach((line) => ctx.out(line));
    ctx.logger.debug('Query finished', { rows: rows.length });
  } finally {
    client.close();
  }
}
