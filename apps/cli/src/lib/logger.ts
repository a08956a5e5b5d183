export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink and level, different "[scope]" tag. */
  child(scope: string): Logger;
}

/**
 * Console logger that prefixes every line with a bracketed scope tag,
 * e.g. "[reconciler] Adding 203.0.113.5 (Laptop)".
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  const tag = `[${scope}]`;

  return {
    debug(message) {
      if (enabled("debug")) console.log(`${tag} ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`${tag} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${tag} ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`${tag} ${message}`);
    },
    child(childScope) {
      return createLogger(childScope, level);
    },
  };
}
