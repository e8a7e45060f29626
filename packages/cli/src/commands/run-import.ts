import { SqliteClient, createBulkInsertTuning } from '@sysml-sql/connector-db';
import { Importer, type ImportResult } from '@sysml-sql/importer';
import type { CommandContext } from '../context.js';

interface ImportFlags {
  vacuum?: boolean;
  disableForeignKeyChecks?: boolean;
}

/**
 * Import records into a database file with the bulk-insert pragmas applied
 */
export function importIntoDatabase(
  dbFile: string,
  records: readonly unknown[],
  flags: ImportFlags,
  ctx: CommandContext
): ImportResult {
  const vacuum = flags.vacuum ?? ctx.config.import?.vacuum ?? false;
  const disableForeignKeyChecks =
    flags.disableForeignKeyChecks ?? ctx.config.import?.disableForeignKeyChecks ?? false;

  const client = new SqliteClient({ path: dbFile, foreignKeys: !disableForeignKeyChecks, logger: ctx.logger });
  try {
    const importer = new Importer(client, {
      vacuum,
      disableForeignKeyChecks,
      relationTypes: ctx.config.schema?.relationTypes,
      tuning: createBulkInsertTuning(client, ctx.logger),
      logger: ctx.logger,
    });
    return importer.importElements(records);
  } finally {
    client.close();
  }
}

export function formatImportSummary(dbFile: string, result: ImportResult): string[] {
  const lines = [
    `Imported ${result.elements} elements and ${result.relations} relations into ${dbFile} in ${result.durationMs}ms`,
  ];
  if (result.duplicates > 0) {
    lines.push(`  ${result.duplicates} repeated elements dropped`);
  }
  if (result.replacedRelations > 0) {
    lines.push(`  ${result.replacedRelations} previous relations replaced`);
  }
  if (result.danglingReferences.length > 0) {
    lines.push(`  ${result.danglingReferences.length} references to unknown elements`);
  }
  if (result.unmappedAttributes.length > 0) {
    lines.push(`  attributes without a column: ${result.unmappedAttributes.join(', ')}`);
  }
  for (const failure of result.coercionFailures) {
    lines.push(
      `  ${failure.count} values of ${failure.table}.${failure.column} did not fit ${failure.columnType} and were stored as NULL (first: ${failure.elementId})`
    );
  }
  return lines;
}
