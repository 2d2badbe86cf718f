import { getConfig, type LogLevel } from "./config";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type Logger = {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
};

/**
 * Console logger prefixed with a scope tag, e.g. `[pipeline]`. The level is
 * read from config at call time so `setConfig` takes effect immediately.
 */
export function createLogger(
  scope: string,
  level?: LogLevel,
): Logger {
  const enabled = (wanted: LogLevel): boolean =>
    LEVEL_RANK[level ?? getConfig().logLevel] >= LEVEL_RANK[wanted];
  const prefix = `[${scope}]`;

  return {
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    debug(message, ...details) {
      if (enabled("debug")) console.log(prefix, message, ...details);
    },
  };
}
