export type { Logger, LogLevel } from './types.js';
export { createLogger, getRootLogger, resolveLogLevel } from './create-logger.js';
