export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  readonly component?: string;
  readonly operationId?: string;
  readonly operationType?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  child(context: LogContext): Logger;
  debug(message: string, fields?: LogContext): void;
  info(message: string, fields?: LogContext): void;
  warn(message: string, fields?: LogContext): void;
  error(message: string, fields?: LogContext): void;
}

export interface CreateLoggerOptions {
  readonly level?: LogLevel;
}

export function createLogger(
  context: LogContext = {},
  options: CreateLoggerOptions = {},
): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const log = (level: LogLevel, message: string, fields?: LogContext): void => {
    if (LEVEL_ORDER[level] >= threshold) {
      writeLog(level, message, context, fields);
    }
  };

  return {
    child(childContext: LogContext): Logger {
      return createLogger(
        {
          ...context,
          ...compact(childContext),
        },
        options,
      );
    },
    debug(message: string, fields?: LogContext): void {
      log("debug", message, fields);
    },
    info(message: string, fields?: LogContext): void {
      log("info", message, fields);
    },
    warn(message: string, fields?: LogContext): void {
      log("warn", message, fields);
    },
    error(message: string, fields?: LogContext): void {
      log("error", message, fields);
    },
  };
}

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return undefined;
}

function writeLog(
  level: LogLevel,
  message: string,
  context: LogContext,
  fields?: LogContext,
): void {
  const record = {
    ts: new Date().toISOString(),
    level,
    message,
    ...compact(context),
    ...compact(fields),
  };

  const serialized = JSON.stringify(record);
  if (level === "error") {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

function compact(input: LogContext | undefined): LogContext {
  if (!input) {
    return {};
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
