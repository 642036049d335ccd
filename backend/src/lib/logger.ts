export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Console logger that drops messages below `level`. */
export function createLogger(level: LogLevel = "info", scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : "";
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  return {
    debug: (message, ...args) => { if (enabled("debug")) console.debug(prefix + message, ...args); },
    info: (message, ...args) => { if (enabled("info")) console.log(prefix + message, ...args); },
    warn: (message, ...args) => { if (enabled("warn")) console.warn(prefix + message, ...args); },
    error: (message, ...args) => { if (enabled("error")) console.error(prefix + message, ...args); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
