import { z } from 'zod';
import { ConfigError, parseElementRecords } from '@sysml-sql/core';
import {
  SysmlApiClient,
  SysmlModelSource,
  type CommitSelector,
  type ProjectSelector,
} from '@sysml-sql/connector-api';
import { createJsonDumpFile } from '@sysml-sql/connector-file';
import { resolveCredentials } from '../config.js';
import { parseOptions, type CommandContext } from '../context.js';
import { formatImportSummary, importIntoDatabase } from './run-import.js';

const fetchOptionsSchema = z.object({
  projectId: z.string().min(1).optional(),
  projectName: z.string().min(1).optional(),
  commitId: z.string().min(1).optional(),
  branchId: z.string().min(1).optional(),
  branchName: z.string().min(1).optional(),
  allowInvalidCerts: z.boolean().optional(),
  dumpJson: z.string().min(1).optional(),
  append: z.boolean().optional(),
  pretty: z.boolean().optional(),
  pageSize: z.coerce.number().int().positive().optional(),
  import: z.boolean().default(true),
  vacuum: z.boolean().optional(),
  disableForeignKeyChecks: z.boolean().optional(),
});

type FetchOptions = z.infer<typeof fetchOptionsSchema>;

function invalidArgument(message: string, suggestion?: string): ConfigError {
  return new ConfigError({ code: 'INVALID_ARGUMENT', message, suggestion });
}

function projectSelector(options: FetchOptions): ProjectSelector {
  if (options.projectId !== undefined && options.projectName !== undefined) {
    throw invalidArgument('--project-id and --project-name exclude each other');
  }
  if (options.projectId !== undefined) return { by: 'id', id: options.projectId };
  if (options.projectName !== undefined) return { by: 'name', name: options.projectName };
  throw invalidArgument('No project given', 'Pass --project-id <id> or --project-name <name>.');
}

/** The head of the default branch unless a commit or branch is given */
function commitSelector(options: FetchOptions): CommitSelector {
  const given = [options.commitId, options.branchId, options.branchName].filter((v) => v !== undefined);
  if (given.length > 1) {
    throw invalidArgument('--commit-id, --branch-id and --branch-name exclude each other');
  }
  if (options.commitId !== undefined) return { by: 'commit', id: options.commitId };
  if (options.branchId !== undefined) return { by: 'branch-id', id: options.branchId };
  if (options.branchName !== undefined) return { by: 'branch-name', name: options.branchName };
  return { by: 'default-branch' };
}

export async function fetchModel(
  dbFile: string,
  baseUrl: string,
  rawOptions: unknown,
  ctx: CommandContext
): Promise<void> {
  const options = parseOptions(fetchOptionsSchema, rawOptions, 'fetch');
  if (!options.import && options.dumpJson === undefined) {
    throw invalidArgument('--no-import without --dump-json leaves nothing to do');
  }
  if (options.append && options.dumpJson === undefined) {
    throw invalidArgument('--append needs --dump-json <file>');
  }
  const project = projectSelector(options);
  const commit = commitSelector(options);

  const fetchConfig = ctx.config.fetch ?? {};
  const credentials = resolveCredentials(ctx.env, ctx.config);
  const client = new SysmlApiClient({
    baseUrl,
    credentials,
    allowInvalidCerts: options.allowInvalidCerts ?? fetchConfig.allowInvalidCerts,
    requestTimeoutMs: fetchConfig.requestTimeoutMs,
    timeoutMs: fetchConfig.timeoutMs,
    retries: fetchConfig.retries,
    transport: ctx.transport,
    sleep: ctx.sleep,
    logger: ctx.logger,
  });

  const source = new SysmlModelSource({
    client,
    project,
    commit,
    pageSize: options.pageSize ?? fetchConfig.pageSize,
    logger: ctx.logger,
  });
  ctx.logger.info('Fetching model', { source: source.describe() });
  const records = await source.readElements().finally(() => client.close());

  const model = source.resolved;
  ctx.out(
    model
      ? `Fetched ${records.length} elements of project "${model.projectName}" (${model.projectId}), commit ${model.commitId}`
      : `Fetched ${records.length} elements`
  );

  if (options.dumpJson !== undefined) {
    const dump = createJsonDumpFile({ filePath: options.dumpJson, pretty: options.pretty, logger: ctx.logger });
    const parsed = parseElementRecords(records);
    if (options.append) {
      const appended = await dump.appendElements(parsed);
      ctx.out(`Appended ${appended.added} elements to ${options.dumpJson} (${appended.total} in total)`);
    } else {
      await dump.writeElements(parsed);
      ctx.out(`Wrote ${parsed.length} elements to ${options.dumpJson}`);
    }
  }

  if (options.import) {
    const result = importIntoDatabase(dbFile, records, options, ctx);
    formatImportSummary(dbFile, result).forEach((line) => ctx.out(line));
  }
}
