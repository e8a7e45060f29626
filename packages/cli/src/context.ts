import type { z } from 'zod';
import { ConfigError, formatZodIssues, type Logger } from '@sysml-sql/core';
import type { HttpTransport } from '@sysml-sql/connector-api';
import type { ConfigFile } from './config.js';

/** Writes one line of command output */
export type OutputSink = (line: string) => void;

export interface CommandContext {
  logger: Logger;
  config: ConfigFile;
  env: NodeJS.ProcessEnv;
  out: OutputSink;
  /** HTTP transport of the API client; undici when absent */
  transport?: HttpTransport;
  /** Replaces the backoff sleep of the API client */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Validate parsed command-line options
 */
export function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  command: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError({
      code: 'INVALID_ARGUMENT',
      message: formatZodIssues(`Invalid options for ${command}`, result.error),
      suggestion: `Run \`sysml-sql ${command} --help\` for the accepted options.`,
    });
  }
  return result.data;
}
