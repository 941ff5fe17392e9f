/**
 * Leveled logger injected into the pipeline stages. The shape matches both
 * `console` and the logger argument snarkjs accepts, so either can be passed
 * straight through.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createConsoleLogger(
  level: LogLevel = "info",
  prefix = "[checkzkp]",
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: enabled("debug")
      ? (message, ...args) => console.debug(`${prefix} ${message}`, ...args)
      : noop,
    info: enabled("info")
      ? (message, ...args) => console.info(`${prefix} ${message}`, ...args)
      : noop,
    warn: enabled("warn")
      ? (message, ...args) => console.warn(`${prefix} ${message}`, ...args)
      : noop,
    error: enabled("error")
      ? (message, ...args) => console.error(`${prefix} ${message}`, ...args)
      : noop,
  };
}

/** Level from CHECKZKP_LOG_LEVEL, falling back to `fallback` when unset or unknown */
export function logLevelFromEnv(fallback: LogLevel = "info"): LogLevel {
  const raw = (process.env.CHECKZKP_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : fallback;
}
