import { getConfig } from "../config";

import type { LogLevel } from "./schema";

export type LogFormat = "pretty" | "json";

export interface LoggerConfig {
  level: LogLevel;
  format?: LogFormat;
  /** Fields merged into the context of every entry */
  bindings?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const mergeContext = (
  bindings: Record<string, unknown> | undefined,
  context: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined => {
  if (!bindings) return context;
  if (!context) return bindings;
  return { ...bindings, ...context };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Derive a logger whose entries carry the given fields */
  child: (bindings: Record<string, unknown>) => Logger;
}

const defaultLoggerConfig = (): LoggerConfig => {
  const config = getConfig();
  return {
    level: config.logging.level,
    format: config.server.nodeEnv === "development" ? "pretty" : "json",
  };
};

export const createLogger = (loggerConfig: LoggerConfig = defaultLoggerConfig()): Logger => {
  const { level, format = "json", bindings } = loggerConfig;

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) return;
    const line = formatLog(
      createLogEntry(entryLevel, message, mergeContext(bindings, context), error),
      format,
    );
    if (entryLevel === "error") {
      console.error(line);
    } else if (entryLevel === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (childBindings) =>
      createLogger({ level, format, bindings: mergeContext(bindings, childBindings) }),
  };
};

export const logger = createLogger();
