/**
 * Leveled logging for builders.
 *
 * @packageDocumentation
 */

/**
 * - `silent`: nothing
 * - `minimal`: one line per build
 * - `verbose`: also account table and size details
 */
export type LogLevel = 'silent' | 'minimal' | 'verbose';

/**
 * Custom logger function.
 */
export type Logger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Default logger (console).
 */
export function defaultLogger(message: string, data?: Record<string, unknown>): void {
  if (data) {
    console.log(`[Wirecraft] ${message}`, data);
  } else {
    console.log(`[Wirecraft] ${message}`);
  }
}

export interface LeveledLogger {
  readonly level: LogLevel;
  minimal(message: string, data?: Record<string, unknown>): void;
  verbose(message: string, data?: Record<string, unknown>): void;
}

/**
 * Wrap a logger so calls below the configured level are dropped.
 */
export function createLeveledLogger(level: LogLevel, logger: Logger = defaultLogger): LeveledLogger {
  return {
    level,
    minimal(message, data) {
      if (level !== 'silent') logger(message, data);
    },
    verbose(message, data) {
      if (level === 'verbose') logger(message, data);
    },
  };
}
