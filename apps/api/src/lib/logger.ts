export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(context: LogContext, message: string): void;
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
};

type LogRecord = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
};

const LEVEL_SET = new Set<string>(LOG_LEVELS);

const ANSI: Record<LogLevel, string> = {
  debug: "\u001b[36m",
  info: "\u001b[32m",
  warn: "\u001b[33m",
  error: "\u001b[31m"
};
const ANSI_RESET = "\u001b[0m";

const CIRCULAR = "[Circular]";
const UNSERIALIZABLE = "[Unserializable]";

// Fields the warehouse error classes add on top of name and message.
const ERROR_FIELDS = ["code", "status", "backend", "template", "field"] as const;

const isLogLevel = (value: string): value is LogLevel => LEVEL_SET.has(value);

// Read per call: tests flip LOG_LEVEL and NODE_ENV without reloading the module.
const resolveThreshold = (): LogLevel | null => {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }

  switch (process.env.NODE_ENV) {
    case "test":
      return null;
    case "production":
      return "info";
    default:
      return "debug";
  }
};

const isEnabled = (level: LogLevel): boolean => {
  const threshold = resolveThreshold();
  return threshold !== null && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
};

const toLoggable = (value: unknown, seen: WeakSet<object>): unknown => {
  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (value === null || typeof value !== "object") {
    return value;
  }

  if (seen.has(value)) {
    return CIRCULAR;
  }

  seen.add(value);
  try {
    if (value instanceof Error) {
      return serializeError(value, seen);
    }

    if (Array.isArray(value)) {
      return value.map((item) => toLoggable(item, seen));
    }

    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toLoggable(item, seen)]));
  } catch {
    return UNSERIALIZABLE;
  } finally {
    seen.delete(value);
  }
};

const serializeError = (error: Error, seen: WeakSet<object>): LogContext => {
  const serialized: LogContext = { name: error.name, message: error.message };

  ERROR_FIELDS.forEach((field) => {
    const value: unknown = Reflect.get(error, field);
    if (value !== undefined && value !== null) {
      serialized[field] = value;
    }
  });

  if (error.cause !== undefined) {
    serialized.cause = toLoggable(error.cause, seen);
  }

  serialized.stack = error.stack;
  return serialized;
};

const renderJson = (record: LogRecord): string => {
  return JSON.stringify({
    timestamp: record.timestamp,
    level: record.level,
    message: record.message,
    ...record.context
  });
};

const renderPretty = (record: LogRecord): string => {
  const suffix = Object.keys(record.context).length > 0 ? ` ${JSON.stringify(record.context)}` : "";
  return `${record.timestamp} ${ANSI[record.level]}${record.level.toUpperCase()}${ANSI_RESET} ${record.message}${suffix}`;
};

const emit = (level: LogLevel, line: string, production: boolean): void => {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "info":
      // Collectors read stdout for everything below warn.
      if (production) {
        console.log(line);
      } else {
        console.info(line);
      }
      return;
    case "debug":
      if (production) {
        console.log(line);
      } else {
        console.debug(line);
      }
  }
};

/** A logger whose entries always carry `bindings`; call-site context wins on key clashes. */
export const createLogger = (bindings: LogContext = {}): Logger => {
  const write = (level: LogLevel, context: LogContext, message: string): void => {
    if (!isEnabled(level)) {
      return;
    }

    const seen = new WeakSet<object>();
    const merged = { ...bindings, ...context };
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.fromEntries(Object.entries(merged).map(([key, value]) => [key, toLoggable(value, seen)]))
    };

    const production = process.env.NODE_ENV === "production";
    emit(level, production ? renderJson(record) : renderPretty(record), production);
  };

  return {
    debug: (context, message) => write("debug", context, message),
    info: (context, message) => write("info", context, message),
    warn: (context, message) => write("warn", context, message),
    error: (context, message) => write("error", context, message),
    child: (context) => createLogger({ ...bindings, ...context })
  };
};

export const logger = createLogger();
