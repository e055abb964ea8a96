/**
 * Logger Helpers
 *
 * Logger construction for the CLI, plus lazy evaluation of log context so
 * per-entry walk logging costs nothing when debug is off.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/** Environment override for the configured level */
export const LOG_LEVEL_ENV = 'HUB_CACHE_LOG_LEVEL';

const LEVELS: readonly LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((candidate) => candidate === value);
}

/**
 * Create the process logger. Writes JSON lines to stderr so stdout stays
 * reserved for command output.
 *
 * @param level - Configured level; a valid `HUB_CACHE_LOG_LEVEL` wins unless
 *   `force` is set
 */
export function createLogger(level: LevelWithSilent = 'info', force = false): Logger {
  const envLevel = process.env[LOG_LEVEL_ENV];
  return pino(
    { name: 'hub-cache-verify', level: !force && isLevel(envLevel) ? envLevel : level },
    pino.destination(2)
  );
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ commit, entries: stack.length }), 'Walking snapshot');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
