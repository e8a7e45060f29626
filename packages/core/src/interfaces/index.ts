export type { BulkInsertTuning } from './bulk-insert-tuning.js';
export type { IDatabaseGateway } from './database-gateway.js';
export type { ElementSource } from './element-source.js';
