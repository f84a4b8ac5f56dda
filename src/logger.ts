/**
 * Logger abstraction.
 *
 * Structured, level-based logging with persistent context fields.
 * Every entry is passed through secret redaction before it reaches the
 * handler, so run-scoped credentials registered with `registerSecretValues()`
 * never show up in log output.
 */

import { maskSecretsInValue } from './domain/errors';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes one JSON object per line. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  switch (entry.level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;
const secretValues = new Set<string>();

/** Replace the log sink (tests, external log systems). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the console sink. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Parse a level name; unknown names yield undefined. */
export function parseLogLevel(value: string): LogLevel | undefined {
  return Object.values(LogLevel).find((level) => level === value.toLowerCase());
}

/** Values that must be masked wherever they appear in a log entry. */
export function registerSecretValues(values: Iterable<string>): void {
  for (const value of values) {
    if (value) secretValues.add(value);
  }
}

export function clearSecretValues(): void {
  secretValues.clear();
}

/** Strings are masked at any depth of plain objects and arrays. */
function redact(value: unknown): unknown {
  if (secretValues.size === 0) return value;
  return maskSecretsInValue(value, [...secretValues]);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  let safeContext: Record<string, unknown> | undefined;
  if (context) {
    safeContext = {};
    for (const [key, value] of Object.entries(context)) {
      safeContext[key] = redact(value);
    }
  }
  currentHandler({
    level,
    message: String(redact(message)),
    context: safeContext,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ component: 'shipwright' });
