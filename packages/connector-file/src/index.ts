/**
 * @sysml-sql/connector-file
 *
 * JSON dump files of SysML v2 models
 */

export {
  JsonDumpFile,
  createJsonDumpFile,
  type JsonDumpFileConfig,
  type AppendResult,
} from './json-dump.js';
