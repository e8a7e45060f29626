export {
  Logger,
  LOG_LEVELS,
  redactSecrets,
  levelFromVerbosity,
  isLogLevel,
  type LogLevel,
  type LogFormat,
  type LogSink,
  type LoggerOptions,
} from './logger.js';
