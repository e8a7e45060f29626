import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  ConfigError,
  errorMessage,
  formatZodIssues,
  isLogLevel,
  isPlainObject,
  levelFromVerbosity,
  type LogLevel,
} from '@sysml-sql/core';

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError({
      code: 'MISSING_ENV',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Set ${name}, or write \${${name}:-default} to fall back to a default.`,
      context: { variable: name },
    });
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') return expandEnvInString(value, options);
  if (Array.isArray(value)) return value.map((v) => expandEnvVars(v, options));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const loggingSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['text', 'json']).optional(),
  })
  .strict();

const retriesSchema = z
  .object({
    attempts: z.number().int().min(1).max(20).optional(),
    baseDelayMs: z.number().int().min(0).optional(),
    maxDelayMs: z.number().int().min(0).optional(),
  })
  .strict();

const fetchSchema = z
  .object({
    pageSize: z.number().int().positive().optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    retries: retriesSchema.optional(),
    allowInvalidCerts: z.boolean().optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
  })
  .strict();

const importSchema = z
  .object({
    vacuum: z.boolean().optional(),
    disableForeignKeyChecks: z.boolean().optional(),
  })
  .strict();

const schemaOptionsSchema = z
  .object({
    polymorphicFields: z.array(z.string().min(1)).optional(),
    relationTypes: z.array(z.string().min(1)).optional(),
    indexedColumns: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    logging: loggingSchema.optional(),
    fetch: fetchSchema.optional(),
    import: importSchema.optional(),
    schema: schemaOptionsSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

function invalidConfig(path: string, message: string, cause?: unknown): ConfigError {
  return new ConfigError({
    code: 'INVALID_CONFIG',
    message,
    cause: cause instanceof Error ? cause : undefined,
    context: { path },
  });
}

/**
 * Read, expand and validate a JSON configuration file
 */
export async function loadConfig(configPath: string, env?: NodeJS.ProcessEnv): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw invalidConfig(absolutePath, `Cannot read config file ${absolutePath}: ${errorMessage(error)}`, error);
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw invalidConfig(absolutePath, `Invalid JSON in ${absolutePath}: ${errorMessage(error)}`, error);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, { env }));
  if (!result.success) {
    throw invalidConfig(absolutePath, formatZodIssues(`Invalid config file ${absolutePath}`, result.error));
  }
  return result.data;
}

/**
 * `-v` count first, then `SYSML_SQL_LOG`, then the config file, then info
 */
export function resolveLogLevel(verbosity: number, env: NodeJS.ProcessEnv, config: ConfigFile): LogLevel {
  const fromEnv = env.SYSML_SQL_LOG?.trim().toLowerCase();
  if (fromEnv !== undefined && fromEnv !== '' && !isLogLevel(fromEnv)) {
    throw new ConfigError({
      code: 'INVALID_ARGUMENT',
      message: `SYSML_SQL_LOG has an unknown level "${fromEnv}"`,
      suggestion: 'Use one of trace, debug, info, warn, error.',
    });
  }
  const fallback = fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : (config.logging?.level ?? 'info');
  return levelFromVerbosity(verbosity, fallback);
}

/**
 * Environment variables override the config file
 */
export function resolveCredentials(
  env: NodeJS.ProcessEnv,
  config: ConfigFile
): { username?: string; password?: string } {
  const username = env.SYSML_USERNAME || config.fetch?.username;
  const password = env.SYSML_PASSWORD ?? config.fetch?.password;
  return { username: username || undefined, password };
}
