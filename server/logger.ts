export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-GB", { hour12: false });
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Tagged console logger, e.g. `12:04:51 [cards] saved card ...`
 */
export function createLogger(source: string): Logger {
  const line = (message: string) => `${timestamp()} [${source}] ${message}`;

  return {
    debug(message) {
      if (enabled("debug")) console.debug(line(message));
    },
    info(message) {
      if (enabled("info")) console.log(line(message));
    },
    warn(message) {
      if (enabled("warn")) console.warn(line(message));
    },
    error(message, error) {
      if (!enabled("error")) return;
      if (error === undefined) {
        console.error(line(message));
      } else {
        console.error(line(message), error);
      }
    },
  };
}
