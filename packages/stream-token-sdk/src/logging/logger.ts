import pino, { type Logger, type LevelWithSilent } from 'pino';

/** Environment variable that sets the default log level. */
export const LOG_LEVEL_ENV = 'STREAM_TOKEN_LOG_LEVEL';

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const isLevel = (value: string): value is LevelWithSilent =>
  LEVELS.some((level) => level === value);

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Log level (default: STREAM_TOKEN_LOG_LEVEL or "info") */
  readonly level?: LevelWithSilent;
  /** Logger name, added to every line */
  readonly name?: string;
}

/**
 * Resolves the log level from options, then the environment.
 */
export const resolveLogLevel = (level?: LevelWithSilent): LevelWithSilent => {
  if (level !== undefined) {
    return level;
  }
  const fromEnv = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return fromEnv !== undefined && isLevel(fromEnv) ? fromEnv : 'info';
};

/**
 * Creates a structured JSON logger.
 *
 * API keys, client secrets and token signatures must never be passed to it;
 * use `redactToken` before logging a token.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', name: 'token-broker' });
 * ```
 */
export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino({
    name: options.name ?? 'stream-token-sdk',
    level: resolveLogLevel(options.level),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

export type { Logger, LevelWithSilent };
