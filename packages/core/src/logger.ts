/**
 * Conditional logging utility for quadgrid
 *
 * Provides tagged logging that can be controlled via log levels.
 * Library code logs at debug for lifecycle events, so the default WARN
 * level keeps consumers quiet unless they opt in.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Log Levels
// ─────────────────────────────────────────────────────────────────────────────

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

/** Environment variable read by configureLogging() */
export const LOG_LEVEL_ENV = "QUADGRID_LOG_LEVEL";

const LEVEL_NAMES = new Map<string, LogLevel>([
  ["debug", LogLevel.DEBUG],
  ["info", LogLevel.INFO],
  ["warn", LogLevel.WARN],
  ["error", LogLevel.ERROR],
  ["none", LogLevel.NONE],
  ["silent", LogLevel.NONE]
]);

let currentLevel: LogLevel = LogLevel.WARN;

/**
 * Set the global log level
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Enable verbose logging (DEBUG level)
 */
export function enableVerboseLogging(): void {
  currentLevel = LogLevel.DEBUG;
}

/**
 * Parse a level name ("debug", "WARN", ...). Unknown names yield undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (name === undefined) return undefined;
  return LEVEL_NAMES.get(name.trim().toLowerCase());
}

/**
 * Apply QUADGRID_LOG_LEVEL from an environment record.
 * Leaves the current level untouched when the variable is missing or unknown.
 * @returns The level in effect afterwards
 */
export function configureLogging(env: Record<string, string | undefined>): LogLevel {
  const parsed = parseLogLevel(env[LOG_LEVEL_ENV]);
  if (parsed !== undefined) {
    currentLevel = parsed;
  }
  return currentLevel;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tagged Loggers
// ─────────────────────────────────────────────────────────────────────────────

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Create a tagged logger for a specific module
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(...args: unknown[]): void {
      if (currentLevel <= LogLevel.DEBUG) {
        console.debug(prefix, ...args);
      }
    },

    info(...args: unknown[]): void {
      if (currentLevel <= LogLevel.INFO) {
        console.log(prefix, ...args);
      }
    },

    warn(...args: unknown[]): void {
      if (currentLevel <= LogLevel.WARN) {
        console.warn(prefix, ...args);
      }
    },

    error(...args: unknown[]): void {
      if (currentLevel <= LogLevel.ERROR) {
        console.error(prefix, ...args);
      }
    }
  };
}
