/**
 * Structured logging: one JSON line per entry, bigints written as decimal
 * strings. Tests swap the sink with `setLogOutput`.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  module: string;
  message: string;
  context?: LogContext;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for the same module whose entries always carry `context`. */
  child(context: LogContext): Logger;
}

// ── Sink & Level ──

function writeLine(entry: LogEntry): void {
  const line = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  const stream = entry.level === 'WARN' || entry.level === 'ERROR' ? process.stderr : process.stdout;
  stream.write(line + '\n');
}

let threshold: LogLevel = LogLevel.INFO;
let sink: LogSink = writeLine;

/** Entries below `level` are dropped by every logger. */
export function setGlobalLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Route entries to `next`; with no argument, back to stdout/stderr. */
export function setLogOutput(next: LogSink = writeLine): void {
  sink = next;
}

// ── Loggers ──

function makeLogger(module: string, bound: LogContext): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (level < threshold) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      module,
      message,
    };
    const merged = { ...bound, ...context };
    if (Object.keys(merged).length > 0) entry.context = merged;
    sink(entry);
  };

  return {
    debug: (message, context) => log(LogLevel.DEBUG, message, context),
    info: (message, context) => log(LogLevel.INFO, message, context),
    warn: (message, context) => log(LogLevel.WARN, message, context),
    error: (message, context) => log(LogLevel.ERROR, message, context),
    child: context => makeLogger(module, { ...bound, ...context }),
  };
}

export function createLogger(module: string): Logger {
  return makeLogger(module, {});
}
