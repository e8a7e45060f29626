import { ELEMENTS_TABLE, RELATIONS_TABLE } from '@sysml-sql/core';
import { SqliteClient } from '@sysml-sql/connector-db';
import { readAsset } from '../assets.js';
import type { CommandContext } from '../context.js';

/**
 * Create the tables of the bundled schema; running it again changes nothing
 */
export async function initDb(dbFile: string, ctx: CommandContext): Promise<void> {
  const ddl = await readAsset('schema.sql');
  const client = new SqliteClient({ path: dbFile, logger: ctx.logger });
  try {
    client.executeDdl(ddl);
    const elementColumns = client.tableColumns(ELEMENTS_TABLE).length;
    const relationColumns = client.tableColumns(RELATIONS_TABLE).length;
    ctx.out(`Schema ready in ${dbFile}: ${elementColumns} element columns, ${relationColumns} relation columns`);
  } finally {
    client.close();
  }
}
