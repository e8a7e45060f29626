import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, SchemaError, errorMessage } from '@sysml-sql/core';
import { SqliteClient } from '@sysml-sql/connector-db';
import { emitSchema, resolveSchema, type GeneratedSchema } from '@sysml-sql/schema';
import { parseOptions, type CommandContext } from '../context.js';

const jsonSchemaOptionsSchema = z.object({
  dumpSql: z.string().min(1).optional(),
  init: z.boolean().default(true),
});

async function readSchemaDocument(schemaFile: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(schemaFile, 'utf-8');
  } catch (error) {
    throw new ConfigError({
      code: 'INVALID_ARGUMENT',
      message: `Cannot read schema file ${schemaFile}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { schemaFile },
    });
  }
  try {
    return JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new SchemaError({
      code: 'INVALID_SCHEMA',
      message: `Invalid JSON in ${schemaFile}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { schemaFile },
    });
  }
}

/**
 * DDL of a JSON-Schema document, with the schema options of the config file
 */
async function generateSchema(schemaFile: string, ctx: CommandContext): Promise<GeneratedSchema> {
  const options = ctx.config.schema ?? {};
  const resolved = resolveSchema(await readSchemaDocument(schemaFile), {
    polymorphicFields: options.polymorphicFields,
    logger: ctx.logger,
  });
  return emitSchema(resolved, {
    polymorphicFields: options.polymorphicFields,
    relationTypes: options.relationTypes,
    indexedColumns: options.indexedColumns,
    logger: ctx.logger,
  });
}

export async function jsonSchemaToSqlSchema(
  dbFile: string,
  schemaFile: string,
  rawOptions: unknown,
  ctx: CommandContext
): Promise<void> {
  const options = parseOptions(jsonSchemaOptionsSchema, rawOptions, 'json-schema-to-sql-schema');
  const generated = await generateSchema(schemaFile, ctx);

  if (options.dumpSql) {
    try {
      await writeFile(options.dumpSql, generated.ddl, 'utf-8');
    } catch (error) {
      throw new ConfigError({
        code: 'INVALID_ARGUMENT',
        message: `Cannot write ${options.dumpSql}: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
    ctx.out(`Wrote DDL to ${options.dumpSql}`);
  }

  if (options.init) {
    const client = new SqliteClient({ path: dbFile, logger: ctx.logger });
    try {
      client.executeDdl(generated.ddl);
    } finally {
      client.close();
    }
  }

  ctx.out(
    `Generated ${generated.elementColumns.length} element columns and ${generated.relationColumns.length} relation columns; ` +
      `${generated.relationNames.length} properties become relations` +
      (options.init ? `; schema applied to ${dbFile}` : '')
  );
}
