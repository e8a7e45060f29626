import { Command } from 'commander';
import { z } from 'zod';
import { Logger, type LogSink } from '@sysml-sql/core';
import type { HttpTransport } from '@sysml-sql/connector-api';
import { loadConfig, resolveLogLevel, type ConfigFile } from './config.js';
import { parseOptions, type CommandContext, type OutputSink } from './context.js';
import { fetchModel } from './commands/fetch.js';
import { importJson } from './commands/import-json.js';
import { initDb } from './commands/init-db.js';
import { jsonSchemaToSqlSchema } from './commands/json-schema.js';
import { runQuery } from './commands/query.js';

export interface ProgramOptions {
  /** Command output (default: stdout) */
  out?: OutputSink;
  /** Log lines (default: stderr) */
  logSink?: LogSink;
  env?: NodeJS.ProcessEnv;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
}

const globalOptionsSchema = z.object({
  verbose: z.number().int().min(0).default(0),
  config: z.string().min(1).optional(),
});

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

const writeStdout: OutputSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;

  async function context(command: Command): Promise<CommandContext> {
    const globals = parseOptions(globalOptionsSchema, command.optsWithGlobals(), command.name());
    const config: ConfigFile = globals.config ? await loadConfig(globals.config, env) : {};
    const logger = new Logger({
      level: resolveLogLevel(globals.verbose, env, config),
      format: config.logging?.format,
      sink: options.logSink,
    }).child({ command: command.name() });
    return {
      logger,
      config,
      env,
      out: options.out ?? writeStdout,
      transport: options.transport,
      sleep: options.sleep,
    };
  }

  const program = new Command();

  program
    .name('sysml-sql')
    .description('Load SysML v2 models into SQLite and query them with SQL')
    .version('0.1.0')
    .option('-v, --verbose', 'more logging, repeat for trace output', increaseVerbosity, 0)
    .option('--config <file>', 'JSON configuration file');

  program
    .command('init-db')
    .description('Create the elements and relations tables of the bundled SysML v2 schema; safe to run again')
    .argument('<db-file>', 'SQLite database file, created when missing')
    .action(async (dbFile: string, _opts: unknown, command: Command) => {
      await initDb(dbFile, await context(command));
    });

  program
    .command('import-json')
    .description('Import a JSON dump of elements in one transaction; re-importing replaces rows and outgoing relations')
    .argument('<db-file>', 'initialised SQLite database file')
    .argument('<file>', 'JSON file holding an array of elements')
    .option('--vacuum', 'run VACUUM after the import')
    .option('--disable-foreign-key-checks', 'write relations whose target is unknown')
    .action(async (dbFile: string, file: string, opts: unknown, command: Command) => {
      await importJson(dbFile, file, opts, await context(command));
    });

  program
    .command('json-schema-to-sql-schema')
    .description('Generate the relational schema from a SysML v2 JSON-Schema document')
    .argument('<db-file>', 'SQLite database file to apply the schema to')
    .argument('<schema-file>', 'JSON-Schema document')
    .option('-d, --dump-sql <file>', 'write the generated DDL to a file')
    .option('-n, --no-init', 'do not apply the DDL to the database')
    .action(async (dbFile: string, schemaFile: string, opts: unknown, command: Command) => {
      await jsonSchemaToSqlSchema(dbFile, schemaFile, opts, await context(command));
    });

  program
    .command('fetch')
    .description('Fetch the elements of a commit from a SysML v2 API server, then dump and/or import them')
    .argument('<db-file>', 'initialised SQLite database file')
    .argument('<base-url>', 'API root, e.g. https://sysml.example.org:9000')
    .option('--project-id <id>', 'project by identifier')
    .option('--project-name <name>', 'project by name or unique name prefix')
    .option('--commit-id <id>', 'commit by identifier')
    .option('--branch-id <id>', 'head of the branch with this identifier')
    .option('--branch-name <name>', 'head of the branch with this name or unique name prefix')
    .option('-a, --allow-invalid-certs', 'skip TLS certificate verification')
    .option('-d, --dump-json <file>', 'write the fetched elements to a JSON file')
    .option('--append', 'merge into the --dump-json file instead of replacing it')
    .option('-y, --pretty', 'pretty print the JSON dump')
    .option('-p, --page-size <n>', 'elements per page')
    .option('-n, --no-import', 'do not import into the database')
    .option('--vacuum', 'run VACUUM after the import')
    .option('--disable-foreign-key-checks', 'write relations whose target is unknown')
    .action(async (dbFile: string, baseUrl: string, opts: unknown, command: Command) => {
      await fetchModel(dbFile, baseUrl, opts, await context(command));
    });

  program
    .command('query')
    .description('Run a SQL query and print the rows as tab-separated values')
    .argument('<db-file>', 'SQLite database file, opened read-only')
    .argument('<sql-file>', 'file holding one SQL statement')
    .action(async (dbFile: string, sqlFile: string, _opts: unknown, command: Command) => {
      await runQuery(dbFile, sqlFile, await context(command));
    });

  return program;
}
