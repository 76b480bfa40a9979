/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
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
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
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

const LEVEL_NAMES: readonly string[] = Object.values(LogLevel);

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  const upper = raw?.toUpperCase();
  if (upper !== undefined && isLogLevel(upper)) {
    return upper;
  }
  return LogLevel.INFO;
};

// LOG_LEVEL is re-read on every call.
const getCurrentLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL);

export const shouldLog = (level: LogLevel, current: LogLevel = getCurrentLogLevel()): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[current];
};

const colorize = (message: string, level: LogLevel): string => {
  const color = LEVEL_COLORS[level];
  if (color === null) {
    return message;
  }
  return `${color}${message}\x1b[0m`;
};

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const timestamp = `[${new Date().toISOString()}]`;
  const scopeTag = scope !== undefined ? ` [${scope}]` : "";
  return colorize(`${timestamp} [${level}]${scopeTag}`, level);
};

let sink: LogSink | null = null;

function isFieldObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);
}

function stringifyField(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

export function toFields(args: unknown[]): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (!isFieldObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringifyField(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

export function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringifyField(first);

  // The fields object is carried separately in `fields`.
  const tail = isFieldObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyField).join(" ")}`.trim();
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

function build(scope: string | undefined): Logger {
  return {
    log: (...args: unknown[]) => {
      emit(LogLevel.LOG, scope, args, console.log);
    },
    info: (...args: unknown[]) => {
      emit(LogLevel.INFO, scope, args, console.info);
    },
    debug: (...args: unknown[]) => {
      emit(LogLevel.DEBUG, scope, args, console.log);
    },
    warn: (...args: unknown[]) => {
      emit(LogLevel.WARN, scope, args, console.warn);
    },
    error: (...args: unknown[]) => {
      emit(LogLevel.ERROR, scope, args, console.error);
    },
  };
}

export const logger = {
  ...build(undefined),
  /**
   * Logger whose records carry a fixed scope tag, e.g. `[discovery:5m]`.
   */
  child: (scope: string): Logger => build(scope),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink instead of the console (tests use this to
   * capture records).
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
