import { config, type LogLevel } from "../config";

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type LogMeta = Record<string, unknown>;

const formatMessage = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]` : `[${timestamp}] [${level.toUpperCase()}]`;
  const base = `${prefix} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[config.logLevel];

const write = (level: LogLevel, line: string) => {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "debug":
      console.debug(line);
      return;
    default:
      console.log(line);
  }
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export const createLogger = (scope?: string): Logger => {
  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (!shouldLog(level)) return;
    write(level, formatMessage(level, scope, message, meta));
  };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
};

export const logger = createLogger();
