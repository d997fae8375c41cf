/* Tiny logger with leveled output */
export type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

function resolveLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(candidate) ? candidate : "info";
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[resolveLevel(process.env.LOG_LEVEL)];
}

function format(level: LogLevel, scope: string | undefined, message: string): string {
  const timestamp = new Date().toISOString();
  const prefix = scope ? ` [${scope}]` : "";
  return `[${timestamp}] [${level.toUpperCase()}]${prefix} ${message}`;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  return {
    info: (message) => {
      if (shouldLog("info")) {
        console.log(format("info", scope, message));
      }
    },
    warn: (message) => {
      if (shouldLog("warn")) {
        console.warn(format("warn", scope, message));
      }
    },
    error: (message, error) => {
      if (shouldLog("error")) {
        console.error(format("error", scope, message), error ?? "");
      }
    },
    debug: (message) => {
      if (shouldLog("debug")) {
        console.debug(format("debug", scope, message));
      }
    },
    child: (childScope) =>
      createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger = createLogger();
