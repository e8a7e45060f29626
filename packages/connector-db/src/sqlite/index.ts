export { SqliteClient, type SqliteClientConfig } from './client.js';
export {
  beforeBulkInsert,
  afterBulkInsert,
  resetBulkInsert,
  createBulkInsertTuning,
  type AfterBulkInsertOptions,
} from './tweaks.js';
