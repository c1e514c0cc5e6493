export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Console logger. Messages are prefixed with the scope and the context
 * object is passed through to console.* as-is.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[netscope:${scope}]`;

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const sink = lvl === "debug" ? console.debug : lvl === "info" ? console.log : lvl === "warn" ? console.warn : console.error;
    if (context && Object.keys(context).length) sink(`${prefix} ${message}`, context);
    else sink(`${prefix} ${message}`);
  };

  return {
    debug: (m, c) => emit("debug", m, c),
    info: (m, c) => emit("info", m, c),
    warn: (m, c) => emit("warn", m, c),
    error: (m, c) => emit("error", m, c),
    child: (child) => createLogger(`${scope}:${child}`, level)
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
