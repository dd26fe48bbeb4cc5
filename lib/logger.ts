// lib/logger.ts

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

// LOG_LEVEL=debug|info|warn|error, read on every call so tests can flip it
function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toUpperCase();
  const known = Object.values(LogLevel).find((l) => l === raw);
  return LEVEL_ORDER[known ?? LogLevel.INFO];
}

// Cloud Logging severity names, so the JSON lines ingest cleanly
function mapLogLevelToSeverity(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG:
      return 'DEBUG';
    case LogLevel.INFO:
      return 'INFO';
    case LogLevel.WARN:
      return 'WARNING';
    case LogLevel.ERROR:
      return 'ERROR';
    default:
      return 'DEFAULT';
  }
}

/** Errors don't survive JSON.stringify; flatten them into plain fields. */
export function describeError(err: unknown): LogContext {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    return cause ? { error: err.message, cause } : { error: err.message };
  }
  return { error: String(err) };
}

function log(level: LogLevel, message: string, context?: LogContext) {
  if (LEVEL_ORDER[level] < threshold()) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  const structuredLog = {
    timestamp: entry.timestamp,
    severity: mapLogLevelToSeverity(level),
    level: entry.level,
    message: entry.message,
    ...entry.context,
  };

  console.log(JSON.stringify(structuredLog));
}

export const logger = {
  debug: (message: string, context?: LogContext) => log(LogLevel.DEBUG, message, context),
  info: (message: string, context?: LogContext) => log(LogLevel.INFO, message, context),
  warn: (message: string, context?: LogContext) => log(LogLevel.WARN, message, context),
  error: (message: string, context?: LogContext) => log(LogLevel.ERROR, message, context),
};
