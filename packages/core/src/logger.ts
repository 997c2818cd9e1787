export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Diagnostic sink handed to the adapter; nothing in the core logs elsewhere */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Tag printed in brackets before every line. Default: "Slipway". */
  prefix?: string;
  /** Lowest level that is printed. Default: "info". */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger. `error` and `warn` go to stderr, the rest to
 * stdout, each line tagged with `[prefix]`.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const tag = `[${options?.prefix ?? "Slipway"}]`;
  const threshold = LEVEL_ORDER[options?.level ?? "info"];
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(tag, msg, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(tag, msg, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(tag, msg, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(tag, msg, ...args);
    },
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });
