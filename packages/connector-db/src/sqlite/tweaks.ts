/**
 * Bulk-insert tuning
 *
 * journal_mode = WAL slows bulk inserts down; synchronous = OFF and a large page
 * cache speed them up. Both are reset afterwards.
 */

import type { BulkInsertTuning, Logger } from '@sysml-sql/core';
import type { SqliteClient } from './client.js';

const PAGE_SIZE = 4096;
/** Pages: 4096 * 2^15 pages of 4 KiB, a negative value would mean KiB */
const CACHE_SIZE = PAGE_SIZE * 2 ** 15;

export function beforeBulkInsert(client: SqliteClient, logger?: Logger): void {
  logger?.debug('Applying bulk-insert pragmas');
  client.pragma(`cache_size = ${CACHE_SIZE}`);
  client.pragma(`page_size = ${PAGE_SIZE}`);
  client.pragma('synchronous = OFF');
}

export interface AfterBulkInsertOptions {
  vacuum?: boolean;
  logger?: Logger;
}

export function resetBulkInsert(client: SqliteClient, logger?: Logger): void {
  logger?.debug('Resetting bulk-insert pragmas');
  client.pragma('synchronous = NORMAL');
}

export function afterBulkInsert(client: SqliteClient, options: AfterBulkInsertOptions = {}): void {
  const { logger } = options;
  resetBulkInsert(client, logger);

  for (const op of options.vacuum ? ['VACUUM', 'ANALYZE'] : ['ANALYZE']) {
    const startedAt = Date.now();
    client.executeDdl(op);
    logger?.info(`${op} done`, { durationMs: Date.now() - startedAt });
  }
}

/**
 * The pragmas above as importer hooks
 */
export function createBulkInsertTuning(client: SqliteClient, logger?: Logger): BulkInsertTuning {
  return {
    before: () => beforeBulkInsert(client, logger),
    after: ({ committed, vacuum }) => {
      if (committed) {
        afterBulkInsert(client, { vacuum, logger });
      } else {
        resetBulkInsert(client, logger);
      }
    },
  };
}
