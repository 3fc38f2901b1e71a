export { Logger, logger, createLogger, setGlobalLogLevel, redactSensitiveData, redactMeta } from './logger.js';
export type { LoggerOptions, LogLevel, LogMeta } from './logger.js';
