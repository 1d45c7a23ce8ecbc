import { type LevelWithSilent, type Logger, pino } from 'pino';

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'MINI_REQUEST_LOG_LEVEL';

const LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.includes(value);
}

/**
 * Resolves the log level from an explicit value or the environment, falling back
 * to `silent` so the library stays quiet unless asked.
 */
export function resolveLogLevel(level: string | undefined = process.env[LOG_LEVEL_ENV]): LevelWithSilent {
  const normalized = level?.trim().toLowerCase();
  if (normalized && isLevel(normalized)) {
    return normalized;
  }

  return 'silent';
}

/**
 * Creates the logger used by a client when none is injected.
 */
export function createLogger(level?: string): Logger {
  return pino({ name: 'mini-request', level: resolveLogLevel(level) });
}

let sharedLogger: Logger | undefined;

/**
 * Logger shared by every client constructed without one. Built on first use, so the
 * environment is read once.
 */
export function getDefaultLogger(): Logger {
  sharedLogger ??= createLogger();
  return sharedLogger;
}

export type { Logger };
