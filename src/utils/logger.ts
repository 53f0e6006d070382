/**
 * Minimal leveled logger. All levels write to stderr; stdout is reserved for
 * command output. The CLI picks the level from its global flags.
 */

export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

let currentLogLevel: LogLevel = LogLevel.INFO;

/**
 * Sets the maximum level that will be written.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export const logger = {
  debug: (message: string): void => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.error(message);
    }
  },
  info: (message: string): void => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.error(message);
    }
  },
  warn: (message: string): void => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  error: (message: string): void => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
