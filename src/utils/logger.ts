export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

let currentLevel: LogLevel = "info";
// stdout carries reports, so every level goes to stderr
let sink: LogSink = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Redirect log output. Returns the previous sink so callers can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const prev = sink;
  sink = next;
  return prev;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const tag = scope ? `[${level.toUpperCase()}] (${scope})` : `[${level.toUpperCase()}]`;
  const base = `${ts} ${tag} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
};

/** Logger whose lines are tagged with a component name. */
export function createLogger(scope?: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>): void => {
    if (shouldLog(level)) sink(formatMsg(level, scope, msg, data));
  };
  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data),
  };
}

export const log = createLogger();
