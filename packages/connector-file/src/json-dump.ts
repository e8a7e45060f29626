/**
 * JSON dump files
 * Reads and writes dumps of a model: one JSON array of element records
 */

import { readFile, stat, writeFile } from 'node:fs/promises';
import {
  ImportError,
  dedupeElements,
  errorMessage,
  parseElementRecords,
  type ElementRecord,
  type ElementSource,
  type Logger,
} from '@sysml-sql/core';

export interface JsonDumpFileConfig {
  filePath: string;
  /** Pretty print output (default: false) */
  pretty?: boolean;
  /** Indentation spaces when pretty printing (default: 2) */
  indent?: number;
  logger?: Logger;
}

export interface AppendResult {
  /** Records in the file after the append */
  total: number;
  /** Records that were not in the file before */
  added: number;
  /** Records already present with identical content */
  duplicates: number;
}

function fileError(filePath: string, error: unknown): ImportError {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  if (code === 'ENOENT') {
    return new ImportError({
      code: 'FILE_NOT_FOUND',
      message: `File not found: ${filePath}`,
      suggestion: 'Check that the file path is correct and the file exists.',
      context: { filePath },
    });
  }
  return new ImportError({
    code: 'FILE_IO',
    message: `Cannot access ${filePath}: ${errorMessage(error)}`,
    suggestion: code === 'EACCES' ? 'Check file permissions.' : undefined,
    cause: error instanceof Error ? error : undefined,
    context: { filePath },
  });
}

export class JsonDumpFile implements ElementSource {
  constructor(private readonly config: JsonDumpFileConfig) {}

  get filePath(): string {
    return this.config.filePath;
  }

  describe(): string {
    return this.config.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.config.filePath)).isFile();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
      throw fileError(this.config.filePath, error);
    }
  }

  /**
   * Raw records of the dump; the root must be an array of objects
   */
  async readElements(): Promise<unknown[]> {
    let content: string;
    try {
      content = await readFile(this.config.filePath, 'utf-8');
    } catch (error) {
      throw fileError(this.config.filePath, error);
    }

    let parsed: unknown;
    try {
      // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new ImportError({
        code: 'MALFORMED_DOCUMENT',
        message: `Invalid JSON in ${this.config.filePath}: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
        context: { filePath: this.config.filePath },
      });
    }

    if (!Array.isArray(parsed)) {
      throw new ImportError({
        code: 'MALFORMED_DOCUMENT',
        message: `${this.config.filePath} does not contain an array at root level`,
        suggestion: 'Provide a JSON file whose root is an array of element objects.',
        context: { filePath: this.config.filePath },
      });
    }

    const badIndex = parsed.findIndex(
      (item: unknown) => typeof item !== 'object' || item === null || Array.isArray(item)
    );
    if (badIndex !== -1) {
      throw new ImportError({
        code: 'MALFORMED_DOCUMENT',
        message: `Entry #${badIndex} of ${this.config.filePath} is not an object`,
        context: { filePath: this.config.filePath, index: badIndex },
      });
    }

    this.config.logger?.debug('Read dump', { filePath: this.config.filePath, records: parsed.length });
    return parsed;
  }

  async writeElements(records: readonly ElementRecord[]): Promise<void> {
    const indent = this.config.pretty ? (this.config.indent ?? 2) : undefined;
    try {
      await writeFile(this.config.filePath, JSON.stringify(records, null, indent), 'utf-8');
    } catch (error) {
      throw fileError(this.config.filePath, error);
    }
    this.config.logger?.info(`Wrote ${records.length} elements`, { filePath: this.config.filePath });
  }

  /**
   * Merge records into the dump, creating it when missing
   *
   * Records already in the file with identical content are kept once; the same id
   * with different content is a conflict and leaves the file untouched.
   */
  async appendElements(records: readonly ElementRecord[]): Promise<AppendResult> {
    const existing = (await this.exists()) ? parseElementRecords(await this.readElements()) : [];
    if (existing.length > 0) {
      this.config.logger?.info(`${this.config.filePath} exists, appending to it`, {
        existing: existing.length,
      });
    }

    // Conflicts inside the existing dump surface before new records are looked at
    dedupeElements(existing);
    const merged = dedupeElements([...existing, ...records]);
    const existingIds = new Set(existing.map((record) => record['@id']));
    const added = merged.elements.filter((record) => !existingIds.has(record['@id'])).length;

    await this.writeElements(merged.elements);
    return {
      total: merged.elements.length,
      added,
      duplicates: merged.duplicates,
    };
  }
}

export function createJsonDumpFile(config: JsonDumpFileConfig): JsonDumpFile {
  return new JsonDumpFile(config);
}
