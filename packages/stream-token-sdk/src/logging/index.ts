export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logger.js';
export type { Logger, LevelWithSilent, LoggerOptions } from './logger.js';
