import { z } from 'zod';
import { createJsonDumpFile } from '@sysml-sql/connector-file';
import { parseOptions, type CommandContext } from '../context.js';
import { formatImportSummary, importIntoDatabase } from './run-import.js';

const importJsonOptionsSchema = z.object({
  vacuum: z.boolean().optional(),
  disableForeignKeyChecks: z.boolean().optional(),
});

export async function importJson(
  dbFile: string,
  file: string,
  rawOptions: unknown,
  ctx: CommandContext
): Promise<void> {
  const options = parseOptions(importJsonOptionsSchema, rawOptions, 'import-json');
  const dump = createJsonDumpFile({ filePath: file, logger: ctx.logger });
  const records = await dump.readElements();
  const result = importIntoDatabase(dbFile, records, options, ctx);
  formatImportSummary(dbFile, result).forEach((line) => ctx.out(line));
}
