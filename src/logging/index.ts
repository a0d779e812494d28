export { createFileLogger, silentLogger, formatLogLine } from './logger.js';
export type { Logger, FileLoggerOptions } from './logger.js';
