export { escapeSqlIdent } from './sql.js';
export { isPlainObject, canonicalJson } from './json.js';
export {
  withRetries,
  sleep,
  backoffDelayMs,
  type RetryConfig,
  type RetryContext,
  type RetryHooks,
} from './retry.js';
export { withTimeout } from './timeout.js';
export { ProgressReporter, type ProgressReporterOptions } from './progress.js';
export {
  referenceTarget,
  classifyProperty,
  parseElement,
  parseElementRecords,
  dedupeElements,
  type DedupeResult,
} from './elements.js';
