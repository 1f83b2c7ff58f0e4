export { Logger, redactSecrets, createSilentLogger, createRunId } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
