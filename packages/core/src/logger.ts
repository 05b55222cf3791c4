/**
 * Structured, level-based logging. Entries go to the console as JSON lines
 * unless a different handler is installed with setLogHandler().
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const consoleHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context
  });
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let handler: LogHandler = consoleHandler;
let minLevel: LogLevel = "info";

export function setLogHandler(next: LogHandler | null): void {
  handler = next ?? consoleHandler;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in PRIORITY;
}

function write(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (PRIORITY[level] < PRIORITY[minLevel]) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  return {
    debug: (message, context) => write("debug", message, { ...base, ...context }),
    info: (message, context) => write("info", message, { ...base, ...context }),
    warn: (message, context) => write("warn", message, { ...base, ...context }),
    error: (message, context) => write("error", message, { ...base, ...context }),
    child: (context) => createLogger({ ...base, ...context })
  };
}

export const logger = createLogger({ component: "releasegate" });
