/**
 * Leveled console logger
 *
 * Controlled by the `LOG_LEVEL` environment variable.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level are emitted.
 *
 * Usage: logger.info("message", { ...fields })
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  /** Component that emitted the record, if logged through a scoped logger */
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface ScopedLogger {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m", // Red
  [LogLevel.WARN]: "\x1b[33m", // Yellow
  [LogLevel.INFO]: "\x1b[36m", // Cyan
  [LogLevel.DEBUG]: "\x1b[32m", // Green
  [LogLevel.LOG]: null,
};

const RESET = "\x1b[0m";

function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value?.toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
      return LogLevel.WARN;
    case "INFO":
      return LogLevel.INFO;
    case "DEBUG":
      return LogLevel.DEBUG;
    case "LOG":
      return LogLevel.LOG;
    default:
      return null;
  }
}

let levelOverride: LogLevel | null = null;
let sink: LogSink | null = null;

const getCurrentLogLevel = (): LogLevel => levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;

const shouldLog = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const header = `[${new Date().toISOString()}] [${level}]${scope ? ` [${scope}]` : ""}`;
  const color = LEVEL_COLORS[level];
  return color === null ? header : `${color}${header}${RESET}`;
};

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
}

function toFields(args: unknown[]): Record<string, string> | undefined {
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringify(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringify(first);

  // The fields object is kept in `fields`, not repeated in the message
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringify).join(" ")}`.trim();
}

function emit(level: LogLevel, scope: string | undefined, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  if (sink) {
    sink.write({
      tsMs: Date.now(),
      level,
      scope,
      message: toMessage(args),
      fields: toFields(args),
    });
    return;
  }

  consoleFn(formatHeader(level, scope), ...args);
}

function createScopedLogger(scope: string | undefined): ScopedLogger {
  return {
    log: (...args: unknown[]) => emit(LogLevel.LOG, scope, args, console.log),
    info: (...args: unknown[]) => emit(LogLevel.INFO, scope, args, console.info),
    debug: (...args: unknown[]) => emit(LogLevel.DEBUG, scope, args, console.log),
    warn: (...args: unknown[]) => emit(LogLevel.WARN, scope, args, console.warn),
    error: (...args: unknown[]) => emit(LogLevel.ERROR, scope, args, console.error),
  };
}

export const logger = {
  ...createScopedLogger(undefined),
  /**
   * Logger whose records carry a component name, e.g. logger.child("oracle")
   */
  child: (scope: string): ScopedLogger => createScopedLogger(scope),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: (): LogLevel[] => Object.values(LogLevel),
  /**
   * Pin the level regardless of LOG_LEVEL. Pass null to follow the environment again.
   */
  setLevel: (level: LogLevel | null) => {
    levelOverride = level;
  },
  /**
   * Route records to a custom sink instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore console output.
   */
  clearSink: () => {
    sink = null;
  },
};
