/**
 * Logger.
 *
 * Structured, level-based logging. Each entry is emitted as a single JSON
 * line so a log collector can consume stage transitions directly.
 * The sink can be swapped with setLogHandler() (tests, external collectors).
 */

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

/** Rewrites text before it leaves the process (used for secret redaction). */
export type LogRedactor = (text: string) => string;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error) {
    console.error(line);
  } else if (entry.level === LogLevel.Warn) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let currentHandler: LogHandler = consoleLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log sink. Returns the previous handler so callers can restore it. */
export function setLogHandler(handler: LogHandler): LogHandler {
  const previous = currentHandler;
  currentHandler = handler;
  return previous;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Parse a level name; returns undefined for anything unrecognised. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function redactContext(
  context: Record<string, unknown>,
  redact: LogRedactor,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'string' ? redact(value) : value;
  }
  return out;
}

function emit(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  redact?: LogRedactor,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message: redact ? redact(message) : message,
    context: redact ? redactContext(context, redact) : context,
    timestamp: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
  /** A logger that passes message and string context values through `redact`. */
  withRedactor(redact: LogRedactor): Logger;
}

/** Create a logger with persistent context fields. */
export function createLogger(
  baseContext: Record<string, unknown> = {},
  redact?: LogRedactor,
): Logger {
  return {
    debug: (msg, ctx) => emit(LogLevel.Debug, msg, { ...baseContext, ...ctx }, redact),
    info: (msg, ctx) => emit(LogLevel.Info, msg, { ...baseContext, ...ctx }, redact),
    warn: (msg, ctx) => emit(LogLevel.Warn, msg, { ...baseContext, ...ctx }, redact),
    error: (msg, ctx) => emit(LogLevel.Error, msg, { ...baseContext, ...ctx }, redact),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }, redact),
    withRedactor: (next) =>
      createLogger(baseContext, redact ? (text) => next(redact(text)) : next),
  };
}

/** Root logger. */
export const logger = createLogger({ component: 'shipyard' });
