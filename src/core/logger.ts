type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (message: string) => void>;

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Timestamped console logger for the crawl engine. Silent under Jest;
 * debug lines only with LOG_LEVEL=debug.
 */
export function createLogger(prefix: string): Logger {
  const log = (level: LogLevel) => (message: string): void => {
    if (process.env.NODE_ENV === "test") return;
    if (level === "debug" && process.env.LOG_LEVEL !== "debug") return;
    WRITERS[level](`${new Date().toISOString()} ${prefix} [${level.toUpperCase()}] ${message}`);
  };

  return { debug: log("debug"), info: log("info"), warn: log("warn"), error: log("error") };
}
