export type ReloginLogLevel = "debug" | "info" | "warn" | "error";

export type ReloginLogSink = (level: ReloginLogLevel, line: string) => void;

export interface ReloginLoggerOptions {
  readonly name?: string;
  readonly level?: ReloginLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: ReloginLogSink;
}

export interface ReloginLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ReloginLogger;
}

const LOG_LEVEL_PRIORITY: Record<ReloginLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: ReloginLogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const resolveLevel = (level: ReloginLogLevel | undefined): ReloginLogLevel => {
  if (level) {
    return level;
  }
  const fromEnv = process.env.RELOGIN_LOG_LEVEL;
  if (fromEnv === "debug" || fromEnv === "info" || fromEnv === "warn" || fromEnv === "error") {
    return fromEnv;
  }
  return "info";
};

export const createReloginLogger = (options: ReloginLoggerOptions = {}): ReloginLogger => {
  const threshold = LOG_LEVEL_PRIORITY[resolveLevel(options.level)];
  const sink = options.sink ?? consoleSink;
  const baseFields: Record<string, unknown> = {
    service: options.name ?? "relogin",
    ...options.fields,
  };

  const createInstance = (fields: Record<string, unknown>): ReloginLogger => {
    const write = (level: ReloginLogLevel, message: string, context?: Record<string, unknown>): void => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }
      const payload = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...fields,
        ...context,
      } satisfies Record<string, unknown>;
      sink(level, JSON.stringify(payload));
    };

    return {
      debug: (message, context) => write("debug", message, context),
      info: (message, context) => write("info", message, context),
      warn: (message, context) => write("warn", message, context),
      error: (message, context) => write("error", message, context),
      child: (context) => createInstance({ ...fields, ...context }),
    } satisfies ReloginLogger;
  };

  return createInstance(baseFields);
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
