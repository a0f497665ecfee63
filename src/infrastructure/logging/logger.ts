import { env } from "../../config/env";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

type LogContext = Record<string, unknown>;

const severity: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY
};

let threshold: LogThreshold = env.AUCTION_LOG_LEVEL;

export function setLogLevel(level: LogThreshold) {
  threshold = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return severity[level] >= severity[threshold];
}

const basePayload = (level: LogLevel, message: string, context: LogContext) => ({
  level,
  message,
  time: new Date().toISOString(),
  ...context
});

export function log(level: LogLevel, message: string, context: LogContext = {}) {
  if (!isLevelEnabled(level)) {
    return;
  }
  const line = JSON.stringify(basePayload(level, message, context));
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logError(message: string, error: unknown, context: LogContext = {}) {
  if (error instanceof Error) {
    log("error", message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack
      }
    });
    return;
  }
  log("error", message, { ...context, error });
}
